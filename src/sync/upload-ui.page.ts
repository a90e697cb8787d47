export const UPLOAD_UI_HTML = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width,initial-scale=1" />
  <title>Stock Sync</title>
  <style>
    :root { font-family: "Segoe UI", Tahoma, sans-serif; color-scheme: light; }
    body { margin: 0; background: #f6f8fb; color: #1f2937; }
    .wrap { max-width: 1080px; margin: 32px auto; padding: 0 16px; }
    .card { background: #fff; border: 1px solid #dbe3ef; border-radius: 12px; padding: 16px; margin-bottom: 16px; }
    h1 { margin: 0 0 12px; font-size: 24px; }
    .row { display: flex; gap: 10px; align-items: center; flex-wrap: wrap; margin-bottom: 10px; }
    label { min-width: 160px; }
    button { background: #1165d8; color: #fff; border: 0; border-radius: 8px; padding: 10px 14px; cursor: pointer; }
    button[disabled] { opacity: .5; cursor: not-allowed; }
    .muted { color: #5f6f82; font-size: 14px; }
    .status { font-weight: 600; }
    .ok { color: #0f766e; }
    .err { color: #b91c1c; }
    .grid { display: grid; grid-template-columns: repeat(4, minmax(0, 1fr)); gap: 12px; }
    .pill { border-radius: 10px; padding: 10px 12px; border: 1px solid #dbe3ef; }
    .downloads a { margin-right: 14px; }
    pre { background: #f7f9fc; padding: 12px; border-radius: 8px; overflow-x: auto; font-size: 13px; }
    @media (max-width: 840px) { .grid { grid-template-columns: 1fr 1fr; } }
  </style>
</head>
<body>
  <div class="wrap">
    <div class="card">
      <h1>Physical Stock to Shopify Sync</h1>
      <div class="row">
        <label for="physicalInput">Physical stock export</label>
        <input id="physicalInput" type="file" accept=".csv,.txt,.xlsx,.xls" />
        <select id="physicalDelimiter">
          <option value="">Auto-detect delimiter</option>
          <option value=";">;</option>
          <option value=",">,</option>
        </select>
      </div>
      <div class="row">
        <label for="shopifyInput">Shopify product export</label>
        <input id="shopifyInput" type="file" accept=".csv,.txt,.xlsx,.xls" />
      </div>
      <div class="row">
        <button id="syncBtn">Synchronise</button>
        <span id="status" class="status muted">Select both files to begin</span>
      </div>
      <p class="muted">Rows are matched on the barcode ({product id}-{variant}). Items missing from the physical stock are set to 0, re-issued products are renamed with their season (S1, S2, ...), and unknown items are prepared as draft products.</p>
    </div>

    <div class="card">
      <div class="grid">
        <div class="pill">Matched: <strong id="countMatched">0</strong></div>
        <div class="pill">Zeroed: <strong id="countZeroed">0</strong></div>
        <div class="pill">Carry-over: <strong id="countCarryOver">0</strong></div>
        <div class="pill">New products: <strong id="countNew">0</strong></div>
      </div>
    </div>

    <div class="card">
      <h3>Downloads</h3>
      <div id="downloads" class="downloads muted">Nothing to download yet.</div>
    </div>

    <div class="card">
      <h3>Report</h3>
      <pre id="summary" class="muted">No report yet.</pre>
    </div>
  </div>

  <script src="/sync/upload-ui.js"></script>
</body>
</html>
`;
