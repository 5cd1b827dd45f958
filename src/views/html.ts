export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const styles = `
  :root { --text: #111827; --text-2: #6b7280; --green: #15803d; --red: #b91c1c; --border: #e5e7eb; }
  body { font-family: system-ui, sans-serif; color: var(--text); max-width: 960px; margin: 0 auto; padding: 24px; }
  nav a { margin-right: 16px; color: var(--text-2); }
  textarea, input[type=text] { width: 100%; box-sizing: border-box; padding: 8px; font: inherit; }
  section { border: 1px solid var(--border); border-radius: 8px; padding: 16px; margin: 16px 0; }
  table { width: 100%; border-collapse: collapse; font-size: 14px; }
  th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid var(--border); vertical-align: top; }
  .status-completed-initiated { color: var(--green); font-weight: 600; }
  .status-failed { color: var(--red); font-weight: 600; }
  pre { background: #f9fafb; padding: 12px; overflow-x: auto; }
`;

export function layout(title: string, body: string, script = ''): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · Dialdesk</title>
<style>${styles}</style>
</head>
<body>
<nav><a href="/">Dial</a><a href="/logs">Call log</a></nav>
<h1>${escapeHtml(title)}</h1>
${body}
${script ? `<script>${script}</script>` : ''}
</body>
</html>`;
}
