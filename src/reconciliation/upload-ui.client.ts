export const UPLOAD_UI_CLIENT_JS = `const fbaInput = document.getElementById('fbaInput');
const storefrontInput = document.getElementById('storefrontInput');
const runBtn = document.getElementById('runBtn');
const downloadBtn = document.getElementById('downloadBtn');
const statusEl = document.getElementById('status');
const countMatch = document.getElementById('countMatch');
const countMismatch = document.getElementById('countMismatch');
const countMissingInFba = document.getElementById('countMissingInFba');
const countMissingInStorefront = document.getElementById('countMissingInStorefront');
const rowsWrap = document.getElementById('rowsWrap');

const escapeHtml = (value) => String(value ?? '')
  .replace(/&/g, '&amp;')
  .replace(/</g, '&lt;')
  .replace(/>/g, '&gt;');

const tableHtml = (rows) => {
  if (!rows || rows.length === 0) return '<span class="muted">None</span>';
  const body = rows.map((r) => '<tr>' +
    '<td>' + escapeHtml(r.displayKey) + '</td>' +
    '<td>' + escapeHtml(r.fbaQuantity) + '</td>' +
    '<td>' + escapeHtml(r.storefrontQuantity) + '</td>' +
    '<td>' + escapeHtml(r.status) + '</td>' +
  '</tr>').join('');
  return '<table><thead><tr><th>Identifier</th><th>FBA Qty</th><th>Storefront Qty</th><th>Status</th></tr></thead><tbody>' + body + '</tbody></table>';
};

const buildForm = () => {
  const fba = fbaInput.files && fbaInput.files[0];
  const storefront = storefrontInput.files && storefrontInput.files[0];
  if (!fba || !storefront) {
    statusEl.textContent = 'Please choose both ledgers first.';
    statusEl.className = 'status err';
    return null;
  }

  const formData = new FormData();
  formData.append('fba', fba);
  formData.append('storefront', storefront);
  return formData;
};

const setBusy = (busy) => {
  runBtn.disabled = busy;
  downloadBtn.disabled = busy;
};

runBtn.addEventListener('click', async () => {
  const formData = buildForm();
  if (!formData) return;

  setBusy(true);
  statusEl.textContent = 'Reconciling...';
  statusEl.className = 'status muted';

  try {
    const res = await fetch('/reconciliation/run', { method: 'POST', body: formData });
    const data = await res.json().catch(() => ({}));

    if (!res.ok) {
      statusEl.textContent = data.message || 'Reconciliation failed.';
      statusEl.className = 'status err';
      return;
    }

    const summary = data.summary || {};
    countMatch.textContent = String(summary.match ?? 0);
    countMismatch.textContent = String(summary.mismatch ?? 0);
    countMissingInFba.textContent = String(summary.missingInFba ?? 0);
    countMissingInStorefront.textContent = String(summary.missingInStorefront ?? 0);
    rowsWrap.innerHTML = tableHtml(Array.isArray(data.rows) ? data.rows : []);

    const discrepancies = (summary.totalKeys ?? 0) - (summary.match ?? 0);
    statusEl.textContent = 'Completed. ' + discrepancies + ' identifier(s) need attention.';
    statusEl.className = discrepancies > 0 ? 'status err' : 'status ok';
  } catch (error) {
    statusEl.textContent = 'Network/server error during reconciliation.';
    statusEl.className = 'status err';
  } finally {
    setBusy(false);
  }
});

downloadBtn.addEventListener('click', async () => {
  const formData = buildForm();
  if (!formData) return;

  setBusy(true);
  try {
    const res = await fetch('/reconciliation/report', { method: 'POST', body: formData });
    if (!res.ok) {
      const data = await res.json().catch(() => ({}));
      statusEl.textContent = data.message || 'Report download failed.';
      statusEl.className = 'status err';
      return;
    }

    const disposition = res.headers.get('Content-Disposition') || '';
    const match = /filename="([^"]+)"/.exec(disposition);
    const url = URL.createObjectURL(await res.blob());
    const link = document.createElement('a');
    link.href = url;
    link.download = match ? match[1] : 'inventory-reconciliation';
    link.click();
    URL.revokeObjectURL(url);
  } catch (error) {
    statusEl.textContent = 'Network/server error during download.';
    statusEl.className = 'status err';
  } finally {
    setBusy(false);
  }
});
`;
