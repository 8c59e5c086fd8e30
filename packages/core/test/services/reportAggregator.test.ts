import { describe, expect, it } from 'vitest';
import type { FileResult } from '@/services/chartScanner';
import { aggregateResults, renderReport } from '@/services/reportAggregator';
import type { ChartRoot } from '@/types';

const SEP = '='.repeat(80);
const FILE_SEP = '-'.repeat(40);

const root: ChartRoot = { path: '/charts/demo', name: 'demo', origin: 'argument' };

function scanned(
  relativePath: string,
  references: { path: string; occurrences: number; found: boolean }[]
): FileResult {
  return {
    root: root.path,
    filePath: `${root.path}/${relativePath}`,
    relativePath,
    status: 'scanned',
    occurrences: references.reduce((sum, ref) => sum + ref.occurrences, 0),
    references,
  };
}

describe('Report Aggregator', () => {
  const mixed: FileResult[] = [
    scanned('templates/a.yaml', [
      { path: 'AppName', occurrences: 2, found: true },
      { path: 'Service.Type', occurrences: 1, found: false },
    ]),
    scanned('templates/empty.yaml', []),
    {
      root: root.path,
      filePath: '/charts/demo/templates/bad.yaml',
      relativePath: 'templates/bad.yaml',
      status: 'error',
      error: 'EACCES: permission denied',
    },
  ];

  describe('aggregateResults', () => {
    it('should count occurrences and distinct references', () => {
      const report = aggregateResults([root], mixed);

      expect(report).toMatchObject({
        filesDiscovered: 3,
        filesScanned: 2,
        filesFailed: 1,
        totalOccurrences: 3,
        totalReferences: 2,
        foundCount: 1,
        missingCount: 1,
        success: false,
      });
    });

    it('should succeed when every reference is found', () => {
      const report = aggregateResults([root], [
        scanned('templates/a.yaml', [
          { path: 'AppName', occurrences: 4, found: true },
          { path: 'PG.R1.DBName', occurrences: 1, found: true },
        ]),
        scanned('templates/b.yaml', [{ path: 'AppName', occurrences: 5, found: true }]),
      ]);

      expect(report.totalOccurrences).toBe(10);
      expect(report.foundCount).toBe(3);
      expect(report.success).toBe(true);
    });

    it('should fail when no file was scanned', () => {
      expect(aggregateResults([root], []).success).toBe(false);
      expect(aggregateResults([root], mixed.slice(2)).success).toBe(false);
    });
  });

  describe('renderReport', () => {
    it('should render the header, breakdown and summary', () => {
      const report = aggregateResults([root], mixed);

      const lines = renderReport(report, {
        valuesFile: 'values-dev.yaml',
        chartPath: './charts/demo',
      });

      expect(lines.map(line => line.text)).toEqual([
        SEP,
        'HELM VARIABLE REFERENCE CHECKER REPORT',
        SEP,
        'Helm Charts Path: ./charts/demo',
        'Values File: values-dev.yaml',
        SEP,
        'Found 3 template file(s) to process',
        'Chart: demo (/charts/demo)',
        'File: templates/a.yaml',
        FILE_SEP,
        '  ✓ .Values.AppName',
        '  ✗ .Values.Service.Type (missing)',
        'File: templates/bad.yaml',
        FILE_SEP,
        '  ! unreadable: EACCES: permission denied',
        SEP,
        'Total references processed: 3',
        'SUMMARY: 1/2 variables found in values file',
        '1 file(s) could not be read',
        '1 variable(s) are missing from values-dev.yaml',
        SEP,
      ]);
      expect(lines.filter(line => line.level === 'warn').map(line => line.text)).toEqual([
        '1 file(s) could not be read',
        '1 variable(s) are missing from values-dev.yaml',
      ]);
    });

    it('should group files under each root of a BOM run', () => {
      const other: ChartRoot = { path: '/charts/worker', origin: 'bom' };
      const report = aggregateResults(
        [root, other],
        [
          scanned('a.yaml', [{ path: 'AppName', occurrences: 1, found: true }]),
          {
            root: other.path,
            filePath: '/charts/worker/b.yaml',
            relativePath: 'b.yaml',
            status: 'scanned',
            occurrences: 1,
            references: [{ path: 'Worker.Queue', occurrences: 1, found: true }],
          },
        ]
      );

      const texts = renderReport(report, { valuesFile: 'values.yaml', bomFile: 'bom.yaml' }).map(
        line => line.text
      );

      expect(texts.slice(3, 13)).toEqual([
        'BOM File: bom.yaml (2 chart(s))',
        'Values File: values.yaml',
        SEP,
        'Found 2 template file(s) to process',
        'Chart: demo (/charts/demo)',
        'File: a.yaml',
        FILE_SEP,
        '  ✓ .Values.AppName',
        'Chart: /charts/worker',
        'File: b.yaml',
      ]);
      expect(texts.slice(-2)).toEqual(['All variables are present in the values file!', SEP]);
    });

    it('should warn when nothing was scanned', () => {
      const lines = renderReport(aggregateResults([root], []), { valuesFile: 'values.yaml' });

      expect(lines.slice(-4)).toEqual([
        { level: 'info', text: 'Total references processed: 0' },
        { level: 'info', text: 'SUMMARY: 0/0 variables found in values file' },
        { level: 'warn', text: 'No template files were scanned' },
        { level: 'info', text: SEP },
      ]);
    });

    it('should use the display prefix', () => {
      const report = aggregateResults([root], [
        scanned('a.yaml', [{ path: 'x', occurrences: 1, found: true }]),
      ]);

      const texts = renderReport(report, { valuesFile: 'v.yaml', displayPrefix: '$.Values' }).map(
        line => line.text
      );

      expect(texts).toContain('  ✓ $.Values.x');
    });

    it('should render identical lines for the same report', () => {
      const report = aggregateResults([root], mixed);
      const header = { valuesFile: 'values.yaml', chartPath: 'demo' };

      expect(renderReport(report, header)).toEqual(renderReport(report, header));
    });
  });
});
