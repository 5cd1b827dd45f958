import { CallLogEntry } from '../types';
import { cleanErrorMessage } from '../utils/error-message';
import { escapeHtml, layout } from './html';

function row(entry: CallLogEntry): string {
  return `<tr>
  <td>${escapeHtml(entry.timestamp)}</td>
  <td>${escapeHtml(entry.number)}</td>
  <td class="status-${escapeHtml(entry.status)}">${escapeHtml(entry.status)}</td>
  <td>${entry.sid ? escapeHtml(entry.sid) : ''}</td>
  <td>${entry.error ? escapeHtml(cleanErrorMessage(entry.error)) : ''}</td>
</tr>`;
}

export function logsPage(entries: CallLogEntry[]): string {
  const body = entries.length === 0
    ? '<p>No calls yet.</p>'
    : `<table>
<thead><tr><th>Time</th><th>Number</th><th>Status</th><th>Call SID</th><th>Error</th></tr></thead>
<tbody>
${entries.map(row).join('\n')}
</tbody>
</table>`;

  return layout(
    'Call log',
    `<form method="post" action="/api/cleanup-logs" id="cleanup-form"><button type="submit">Clean up error messages</button></form>
${body}`,
    `document.getElementById('cleanup-form').addEventListener('submit', async (e) => {
  e.preventDefault();
  const res = await fetch('/api/cleanup-logs', { method: 'POST' });
  const data = await res.json();
  alert(data.message || data.error);
  location.reload();
});`,
  );
}
