import { layout } from './html';

const script = `
async function submit(form, url, multipart) {
  const out = document.getElementById('result');
  out.textContent = 'Working…';
  const data = new FormData(form);
  const body = multipart ? data : new URLSearchParams(data);
  try {
    const res = await fetch(url, { method: 'POST', body });
    out.textContent = JSON.stringify(await res.json(), null, 2);
  } catch (err) {
    out.textContent = 'Request failed: ' + err.message;
  }
}
document.getElementById('numbers-form').addEventListener('submit', (e) => {
  e.preventDefault();
  submit(e.target, '/call', true);
});
document.getElementById('command-form').addEventListener('submit', (e) => {
  e.preventDefault();
  const form = e.target;
  form.elements.numbers.value = document.getElementById('numbers').value;
  submit(form, '/ai-command', false);
});
`;

export function homePage(): string {
  return layout(
    'Dial',
    `<section>
  <h2>Numbers</h2>
  <form id="numbers-form">
    <label for="numbers">One per line or comma separated</label>
    <textarea id="numbers" name="numbers" rows="6" placeholder="+18001234567&#10;9895431875"></textarea>
    <p><label>Or upload a .txt / .csv file <input type="file" name="file" accept=".txt,.csv,.tsv,text/plain,text/csv"></label></p>
    <button type="submit">Call all</button>
  </form>
</section>
<section>
  <h2>Command</h2>
  <form id="command-form">
    <input type="text" name="command" placeholder="Call 9876543210 / Start calling all numbers">
    <input type="hidden" name="numbers">
    <p><button type="submit">Run</button></p>
  </form>
</section>
<pre id="result"></pre>`,
    script,
  );
}
