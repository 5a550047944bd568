export const UPLOAD_UI_HTML = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width,initial-scale=1" />
  <title>Inventory Reconciliation</title>
  <style>
    body { margin: 0; font-family: system-ui, sans-serif; background: #f4f6f9; color: #1f2937; }
    main { max-width: 960px; margin: 24px auto; padding: 0 16px; }
    section { background: #fff; border: 1px solid #d8dee8; border-radius: 8px; padding: 16px; margin-bottom: 12px; }
    .row { display: flex; gap: 8px; align-items: center; margin-bottom: 8px; }
    label { min-width: 140px; }
    button { padding: 8px 12px; }
    .muted { color: #5f6f82; font-size: 14px; }
    .ok { color: #0f766e; }
    .err { color: #b91c1c; }
    .counts { display: flex; gap: 24px; }
    table { width: 100%; border-collapse: collapse; font-size: 14px; }
    th, td { text-align: left; border-bottom: 1px solid #e5e9f0; padding: 6px; }
  </style>
</head>
<body>
  <main>
    <section>
      <h1>Inventory Ledger Reconciliation</h1>
      <div class="row">
        <label for="fbaInput">FBA ledger</label>
        <input id="fbaInput" type="file" accept=".csv,.xlsx,.xls" />
      </div>
      <div class="row">
        <label for="storefrontInput">Storefront ledger</label>
        <input id="storefrontInput" type="file" accept=".csv,.xlsx,.xls" />
      </div>
      <div class="row">
        <button id="runBtn">Reconcile</button>
        <button id="downloadBtn">Download report</button>
        <span id="status" class="status muted">Select both ledgers to begin</span>
      </div>
      <p class="muted">Identifiers are matched after trimming and upper-casing. Column names default to the server configuration.</p>
    </section>

    <section>
      <div class="counts">
        <span>Match: <strong id="countMatch">0</strong></span>
        <span>Mismatch: <strong id="countMismatch">0</strong></span>
        <span>Missing in FBA: <strong id="countMissingInFba">0</strong></span>
        <span>Missing in storefront: <strong id="countMissingInStorefront">0</strong></span>
      </div>
    </section>

    <section>
      <h3>Reconciled Rows</h3>
      <div id="rowsWrap" class="muted">No reconciliation run yet.</div>
    </section>
  </main>

  <script src="/reconciliation/upload-ui.js"></script>
</body>
</html>
`;
