/**
 * Human-readable HTML view of a scan: summary block followed by one table
 * row per result, coloured by support status.
 */

import type { ScanResult, ScanSummary } from '../schemas/output.schema.js';

const STYLES = `
    body { font-family: Arial, sans-serif; margin: 20px; }
    .summary { background-color: #f5f5f5; padding: 15px; border-radius: 5px; margin-bottom: 20px; }
    .eol { background-color: #ffebee; border-left: 4px solid #f44336; }
    .active { background-color: #e8f5e8; border-left: 4px solid #4caf50; }
    .unknown { background-color: #fff3e0; border-left: 4px solid #ff9800; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    th { background-color: #f2f2f2; }`;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string | number | null): string {
  if (value === null) return 'N/A';
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderHtmlReport(
  results: readonly ScanResult[],
  summary: ScanSummary,
  timestamp: string,
): string {
  const lines: string[] = [];

  lines.push('<!DOCTYPE html>');
  lines.push('<html>');
  lines.push('<head>');
  lines.push('  <meta charset="utf-8">');
  lines.push(`  <title>EOL Scan Report - ${escapeHtml(timestamp)}</title>`);
  lines.push(`  <style>${STYLES}\n  </style>`);
  lines.push('</head>');
  lines.push('<body>');
  lines.push('  <h1>End of Life Scan Report</h1>');

  // Summary block
  lines.push('  <div class="summary">');
  lines.push('    <h2>Summary</h2>');
  const summaryRows: Array<[string, string | number]> = [
    ['Source File', summary.sourceFile],
    ['Scan Date', summary.scanTimestamp],
    ['Total Packages', summary.totalPackages],
    ['Matched Products', summary.matchedProducts],
    ['EOL Packages', summary.eolPackages],
    ['Active Packages', summary.activePackages],
    ['Unknown Status', summary.unknownPackages],
    ['Not Found', summary.notFoundPackages],
    ['Skipped Rows', summary.skippedRows],
  ];
  for (const [label, value] of summaryRows) {
    lines.push(`    <p><strong>${label}:</strong> ${escapeHtml(value)}</p>`);
  }
  lines.push('  </div>');

  // Detail table
  lines.push('  <h2>Package Details</h2>');
  lines.push('  <table>');
  lines.push(
    '    <tr><th>Row</th><th>Package</th><th>Product</th><th>Version</th><th>Status</th><th>EOL Date</th><th>Message</th></tr>',
  );
  for (const result of results) {
    const cells = [
      result.rowNumber,
      result.originalPackage,
      result.product,
      result.version,
      result.supportStatus,
      result.eolDate,
      result.message,
    ].map((cell) => `<td>${escapeHtml(cell)}</td>`);
    lines.push(`    <tr class="${result.supportStatus}">${cells.join('')}</tr>`);
  }
  lines.push('  </table>');
  lines.push('</body>');
  lines.push('</html>');

  return `${lines.join('\n')}\n`;
}
