import { isValidCnpj, isValidCpf } from "./checksums.js";
import type { Finding, FindingSeverity, PiiKind, TextSpan } from "./types.js";

interface PiiMatcher {
  kind: PiiKind;
  pattern: RegExp;
  checksum?: (value: string) => boolean;
}

// Order is priority: when two hits overlap, the earlier matcher keeps the span.
const MATCHERS: readonly PiiMatcher[] = [
  { kind: "case_number", pattern: /(?<!\d)\d{7}-\d{2}\.\d{4}\.\d\.\d{2}\.\d{4}(?!\d)/g },
  { kind: "company_id", pattern: /(?<!\d)\d{2}\.\d{3}\.\d{3}\/\d{4}-\d{2}(?!\d)/g, checksum: isValidCnpj },
  { kind: "national_tax_id", pattern: /(?<!\d)\d{3}\.\d{3}\.\d{3}-\d{2}(?!\d)/g, checksum: isValidCpf },
  { kind: "company_id", pattern: /(?<![\d.\/-])\d{14}(?![\d\/-])/g, checksum: isValidCnpj },
  { kind: "national_tax_id", pattern: /(?<![\d.\/-])\d{11}(?![\d\/-])/g, checksum: isValidCpf },
  { kind: "email", pattern: /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi },
  { kind: "phone", pattern: /(?<![\d+])(?:\+55\s?)?\(?\d{2}\)?\s?9?\d{4}-?\d{4}(?!\d)/g }
];

export interface PiiScanResult {
  findings: Finding[];
  suppressedCount: number;
}

const overlaps = (a: TextSpan, b: TextSpan): boolean => a.start < b.end && b.start < a.end;

/**
 * Runs every matcher over `text`. Checksum-bearing kinds only become findings
 * when their check digits validate; failed checksums are counted as suppressed
 * and their span is not offered to later matchers.
 */
export function scanForPii(text: string, severity: Record<PiiKind, FindingSeverity>): PiiScanResult {
  const findings: Finding[] = [];
  // Suppressed hits still claim their span so a looser matcher cannot re-report it.
  const claimed: TextSpan[] = [];
  let suppressedCount = 0;

  for (const matcher of MATCHERS) {
    for (const match of text.matchAll(matcher.pattern)) {
      const start = match.index ?? 0;
      const span: TextSpan = { start, end: start + match[0].length };
      if (claimed.some((taken) => overlaps(taken, span))) {
        continue;
      }
      claimed.push(span);

      if (matcher.checksum && !matcher.checksum(match[0])) {
        suppressedCount += 1;
        continue;
      }

      findings.push({
        kind: matcher.kind,
        span,
        checksumVerified: matcher.checksum !== undefined,
        severity: severity[matcher.kind]
      });
    }
  }

  findings.sort((a, b) => a.span.start - b.span.start);
  return { findings, suppressedCount };
}

export function maskFindings(text: string, findings: Finding[], maskToken: string): string {
  let masked = text;
  const bySpanDescending = [...findings].sort((a, b) => b.span.start - a.span.start);
  for (const finding of bySpanDescending) {
    masked = `${masked.slice(0, finding.span.start)}${maskToken}${masked.slice(finding.span.end)}`;
  }
  return masked;
}
