import { describe, test, expect, afterAll } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  escapeHtml,
  escapeMarkdownText,
  exportReport,
  pdfHeaderLines,
  renderCsv,
  renderHtml,
  renderResultsMarkdown,
  renderSummaryMarkdown,
  renderText,
  reportStem,
  toCsvRecord,
} from '../../src/rbac/exporter.js';
import { sampleReport, sampleResult } from '../helpers/reports.js';

const CSV_HEADER_LINE =
  'Test ID,Module,Requirement,Requirement Name,Test Name,Expectation,Status,Message,Error Code,Duration (ms),Timestamp\n';

describe('Report rendering', () => {
  test('should name reports after the run ID', () => {
    expect(reportStem('abc')).toBe('rbac-test-report-abc');
  });

  test('should map a result to a CSV record with an empty error code when absent', () => {
    const record = toCsvRecord(sampleResult({ errorCode: undefined, status: 'FAIL' }));
    expect(record.errorCode).toBe('');
    expect(record.testId).toBe('NET-013');
    expect(record.status).toBe('FAIL');
  });

  test('should render CSV with a header row and one line per result', () => {
    const csv = renderCsv(sampleReport());
    expect(csv).toBe(
      CSV_HEADER_LINE +
        'NET-013,Networking,REQ-11,Network security groups,Open RDP on the NSG,deny,PASS,Denied as expected: no access,AuthorizationFailed,120,2026-10-19T12:00:05.000Z\n'
    );
  });

  test('should escape HTML special characters', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;');
  });

  test('should include summary counts and the abort reason in markdown', () => {
    const report = sampleReport();
    report.metadata.fatalError = 'Setup failed';
    report.cleanup = { succeeded: 3, failed: 1, outcomes: [] };

    const md = renderSummaryMarkdown(report);

    expect(md.startsWith('# RBAC Test Report\n\n')).toBe(true);
    expect(md).toContain('| Duration | 600.0s |\n');
    expect(md).toContain('> **Run aborted:** Setup failed\n');
    expect(md).toContain('- **Total:** 1\n');
    expect(md).toContain('- **Pass rate:** 100%\n');
    expect(md).toContain('## Cleanup\n\n3 succeeded, 1 failed\n');
  });

  test('should keep markup from Azure error text out of the HTML report', () => {
    const report = sampleReport();
    report.metadata.fatalError = 'Setup failed: <img src=x onerror=alert(1)>';

    expect(renderSummaryMarkdown(report)).toContain('> **Run aborted:** Setup failed: &lt;img src=x onerror=alert(1)&gt;\n');
    expect(renderHtml(report)).not.toContain('<img');
  });

  test('should escape markup and pipes in the custom role name', () => {
    expect(escapeMarkdownText('Ops <b>|</b> & co')).toBe('Ops &lt;b&gt;\\|&lt;/b&gt; &amp; co');
  });

  test('should put the abort reason in the PDF header', () => {
    const report = sampleReport();
    report.metadata.fatalError = 'Setup failed';

    expect(pdfHeaderLines(report)[pdfHeaderLines(report).length - 1]).toBe('Run aborted: Setup failed');
  });

  test('should escape pipes in result messages', () => {
    const md = renderResultsMarkdown([sampleResult({ message: 'a | b' })]);
    expect(md).toContain('| NET-013 | REQ-11 | Open RDP on the NSG | deny | PASS | a \\| b |\n');
  });

  test('should render HTML with status classes and escaped cells', () => {
    const html = renderHtml(sampleReport([sampleResult({ status: 'FAIL', message: '<script>x</script>' })]));
    expect(html).toContain('<h1>RBAC Test Report</h1>');
    expect(html).toContain('<td class="status-fail">FAIL</td>');
    expect(html).toContain('<td>&lt;script&gt;x&lt;/script&gt;</td>');
    expect(html).toContain('Generated by azure-admin-toolkit 1.4.0');
  });

  test('should render aligned plain text', () => {
    const text = renderText(sampleReport());
    const lines = text.split('\n');
    expect(lines[0]).toBe('='.repeat(80));
    expect(lines[1]).toBe('RBAC TEST REPORT');
    expect(lines).toContain('Run ID:         20261019120000abcd');
    expect(lines).toContain('Total: 1  Passed: 1  Failed: 0  Errors: 0  Skipped: 0  Pass rate: 100%');
    expect(lines).toContain('[PASS]    NET-013   Open RDP on the NSG');
    expect(lines).toContain(`${' '.repeat(20)}Denied as expected: no access`);
    expect(text.endsWith('='.repeat(80) + '\n')).toBe(true);
  });
});

describe('exportReport', () => {
  const dir = mkdtempSync(join(tmpdir(), 'rbac-export-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should write each requested format into a created directory', async () => {
    const report = sampleReport();
    const outputDir = join(dir, 'nested');

    const files = await exportReport(report, ['json', 'csv', 'text'], outputDir);

    expect(files).toEqual([
      { format: 'json', path: join(outputDir, 'rbac-test-report-20261019120000abcd.json') },
      { format: 'csv', path: join(outputDir, 'rbac-test-report-20261019120000abcd.csv') },
      { format: 'text', path: join(outputDir, 'rbac-test-report-20261019120000abcd.txt') },
    ]);
    expect(JSON.parse(readFileSync(files[0].path, 'utf-8'))).toEqual(report);
    expect(readFileSync(files[1].path, 'utf-8')).toBe(renderCsv(report));
    expect(readFileSync(files[2].path, 'utf-8')).toBe(renderText(report));
  });
});
