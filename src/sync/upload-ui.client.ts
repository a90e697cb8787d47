export const UPLOAD_UI_CLIENT_JS = `const physicalInput = document.getElementById('physicalInput');
const shopifyInput = document.getElementById('shopifyInput');
const physicalDelimiter = document.getElementById('physicalDelimiter');
const syncBtn = document.getElementById('syncBtn');
const statusEl = document.getElementById('status');
const countMatched = document.getElementById('countMatched');
const countZeroed = document.getElementById('countZeroed');
const countCarryOver = document.getElementById('countCarryOver');
const countNew = document.getElementById('countNew');
const downloadsEl = document.getElementById('downloads');
const summaryEl = document.getElementById('summary');

const FILES = [
  ['combinedCsv', 'shopify_import.csv', 'Shopify import (new + updated)'],
  ['inStockCsv', 'shopify_import_in_stock.csv', 'Shopify import, in-stock products only'],
  ['shopifyCsv', 'shopify_updated.csv', 'Updated Shopify export'],
  ['newProductsCsv', 'new_products.csv', 'New products'],
  ['reportCsv', 'sync_report.csv', 'Report'],
];

const decodeBase64 = (text) => {
  const bytes = Uint8Array.from(atob(text), (c) => c.charCodeAt(0));
  return new Blob([bytes], { type: 'text/csv;charset=utf-8' });
};

const renderDownloads = (data) => {
  downloadsEl.innerHTML = '';
  FILES.forEach(([field, fileName, label]) => {
    if (!data[field]) return;
    const link = document.createElement('a');
    link.href = URL.createObjectURL(decodeBase64(data[field]));
    link.download = fileName;
    link.textContent = label;
    downloadsEl.appendChild(link);
  });
};

syncBtn.addEventListener('click', async () => {
  const physical = physicalInput.files && physicalInput.files[0];
  const shopify = shopifyInput.files && shopifyInput.files[0];
  if (!physical || !shopify) {
    statusEl.textContent = 'Please choose both files first.';
    statusEl.className = 'status err';
    return;
  }

  const formData = new FormData();
  formData.append('physical', physical);
  formData.append('shopify', shopify);
  if (physicalDelimiter.value) {
    formData.append('physicalDelimiter', physicalDelimiter.value);
  }

  syncBtn.disabled = true;
  statusEl.textContent = 'Uploading and processing...';
  statusEl.className = 'status muted';

  try {
    const res = await fetch('/sync/upload', { method: 'POST', body: formData });
    const data = await res.json().catch(() => ({}));

    if (!res.ok) {
      const message = Array.isArray(data.message) ? data.message.join(', ') : data.message;
      statusEl.textContent = message || 'Sync failed.';
      statusEl.className = 'status err';
      return;
    }

    const stats = data.stats || {};
    countMatched.textContent = String(stats.matched ?? 0);
    countZeroed.textContent = String(stats.zeroed ?? 0);
    countCarryOver.textContent = String(stats.carryOver ?? 0);
    countNew.textContent = String(stats.newProducts ?? 0);
    summaryEl.textContent = data.summary || '';
    renderDownloads(data);

    statusEl.textContent = stats.needsReview > 0
      ? 'Completed. Some new products need review.'
      : 'Completed.';
    statusEl.className = stats.needsReview > 0 ? 'status err' : 'status ok';
  } catch (error) {
    statusEl.textContent = 'Network/server error during upload.';
    statusEl.className = 'status err';
  } finally {
    syncBtn.disabled = false;
  }
});
`;
