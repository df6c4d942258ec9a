import crypto from 'node:crypto';

export type AlertSeverity = 'critical' | 'warning' | 'info';

export interface MonitorAlert {
  check: string;
  severity: AlertSeverity;
  text: string;
  timestamp: string;
}

export const ALL_CLEAR_TOKEN = 'ALL_CLEAR';

const SEVERITY_LINE_RE = /^[\s*_>#-]*severity[\s*_]*[:=][\s*_]*(critical|warning|info)\b.*$/im;

// "ALL_CLEAR", "**All clear.**" and "all clear" all reduce to "all clear".
const normalizeMarker = (value: string) =>
  value
    .toLowerCase()
    .replace(/[\s*_`"'.!:,;()-]+/g, ' ')
    .trim();

/**
 * A reply is quiet when its whole text, or its first line, is one of the
 * markers. "All clear except node-3" is not quiet.
 */
export const isAllClear = (reply: string, markers: string[] = []) => {
  const trimmed = reply.trim();
  if (!trimmed) return true;

  const accepted = new Set([normalizeMarker(ALL_CLEAR_TOKEN), ...markers.map(normalizeMarker)].filter(Boolean));
  const firstLine = trimmed.split(/\r?\n/, 1)[0] ?? '';
  return accepted.has(normalizeMarker(trimmed)) || accepted.has(normalizeMarker(firstLine));
};

export const parseSeverity = (reply: string): AlertSeverity => {
  const match = reply.match(SEVERITY_LINE_RE);
  if (!match) return 'warning';
  const value = match[1].toLowerCase();
  return value === 'critical' || value === 'info' ? value : 'warning';
};

export const stripSeverityLine = (reply: string) => reply.replace(SEVERITY_LINE_RE, '').trim();

// Counts and timestamps change between ticks for the same condition.
export const normalizeForFingerprint = (text: string) =>
  text
    .toLowerCase()
    .replace(/\d+/g, '#')
    .replace(/\s+/g, ' ')
    .trim();

export const fingerprint = (text: string) =>
  crypto.createHash('sha256').update(normalizeForFingerprint(text)).digest('hex');

const SEVERITY_LABEL: Record<AlertSeverity, string> = {
  critical: 'CRITICAL',
  warning: 'WARNING',
  info: 'INFO',
};

export const formatAlert = (alert: MonitorAlert) =>
  `🔔 **Monitoring - ${alert.check}** (${SEVERITY_LABEL[alert.severity]})\n\n${alert.text}`;
