/**
 * Result aggregation
 * Pure folds over a scan result into reports
 */

import type {
  L10nReport,
  ProbeErrorKind,
  ScanResult,
  ScanSummary,
} from '../types/scan.js';

/**
 * Code-unit ordering, matching a plain Array#sort of strings
 */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Build the localization report: for each locale, the titles of the sites
 * that advertise it. Failed probes contribute nothing.
 */
export function buildL10nReport(result: ScanResult): L10nReport {
  const sitesByLocale = new Map<string, Set<string>>();

  for (const outcome of result) {
    if (outcome.type !== 'success') {
      continue;
    }
    for (const locale of outcome.metadata.supportedLanguages) {
      let sites = sitesByLocale.get(locale);
      if (!sites) {
        sites = new Set<string>();
        sitesByLocale.set(locale, sites);
      }
      sites.add(outcome.descriptor.title);
    }
  }

  return [...sitesByLocale.keys()].sort(compareStrings).map((locale) => ({
    locale,
    sites: [...(sitesByLocale.get(locale) ?? [])].sort(compareStrings),
  }));
}

/**
 * Render the report as text, one block per locale
 */
export function renderL10nReport(report: L10nReport): string {
  if (report.length === 0) {
    return '';
  }
  const blocks = report.map(
    ({ locale, sites }) => `${locale} (${sites.length}):\n  ${sites.join('\n  ')}`
  );
  return `${blocks.join('\n\n')}\n`;
}

/**
 * Report as a plain object keyed by locale
 */
export function l10nReportToJson(report: L10nReport): Record<string, string[]> {
  return Object.fromEntries(report.map(({ locale, sites }) => [locale, [...sites]]));
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

// Keys are remote-controlled, so they must never be assigned onto a plain object
function toRecord(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => compareStrings(a, b)));
}

/**
 * Totals, failure kinds and version/platform distribution of a scan
 */
export function summarizeScan(result: ScanResult): ScanSummary {
  const failuresByKind: Record<ProbeErrorKind, number> = {
    Unreachable: 0,
    Timeout: 0,
    Malformed: 0,
    HttpError: 0,
  };
  const versions = new Map<string, number>();
  const serverOs = new Map<string, number>();
  let available = 0;

  for (const outcome of result) {
    if (outcome.type === 'success') {
      available++;
      increment(versions, outcome.metadata.version);
      increment(serverOs, outcome.metadata.serverOs);
    } else {
      failuresByKind[outcome.error.kind]++;
    }
  }

  return {
    total: result.length,
    available,
    failed: result.length - available,
    failuresByKind,
    versions: toRecord(versions),
    serverOs: toRecord(serverOs),
  };
}
