import type { ReviewResponse, WireFinding } from '../review/review.types.js';

// CSI sequences: ESC [ ... final_byte
// eslint-disable-next-line no-control-regex
const CSI_REGEX = /[\u001b\u009b][[()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[@-~]/g;
// OSC sequences: ESC ] ... (BEL | ESC \)
// eslint-disable-next-line no-control-regex
const OSC_REGEX = /\u001b\][\s\S]*?(?:\u0007|\u001b\\)/g;
// DCS, PM, APC sequences: ESC (P|^|_) ... ESC \
// eslint-disable-next-line no-control-regex
const DCS_PM_APC_REGEX = /\u001b[P^_][\s\S]*?\u001b\\/g;
// eslint-disable-next-line no-control-regex
const C0_CONTROL_REGEX = /[\x00-\x08\x0B-\x0C\x0E-\x1F\r]/g;

const SEVERITY_LABEL: Record<WireFinding['severity'], string> = {
  high: 'High',
  medium: 'Medium',
  low: 'Low',
};

/** Strip terminal escape sequences and control characters from model or upload text. */
export function sanitize(text: string): string {
  return text
    .replace(OSC_REGEX, '')
    .replace(DCS_PM_APC_REGEX, '')
    .replace(CSI_REGEX, '')
    .replace(C0_CONTROL_REGEX, '');
}

function sanitizeLine(text: string): string {
  return sanitize(text).replace(/[\r\n]+/g, ' ');
}

/** Escape pipe characters and collapse newlines for markdown table cells. */
export function tableCell(text: string): string {
  return sanitizeLine(text).replace(/\|/g, '\\|');
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  if (seconds === 0) return `${ms}ms`;
  return `${remainingSeconds}s`;
}

function modeLabel(response: ReviewResponse): string {
  return response.degraded ? `${response.mode} (degraded)` : response.mode;
}

export function renderMarkdown(response: ReviewResponse): string {
  const lines = [
    `# Review ${sanitizeLine(response.id)}`,
    '',
    `- Mode: ${modeLabel(response)}`,
    `- Score: ${response.score}/100`,
    `- Duration: ${formatDuration(response.durationMs)}`,
    '',
    '## Summary',
    '',
    sanitize(response.summary),
    '',
    '## Findings',
    '',
  ];
  if (response.findings.length === 0) {
    lines.push('No findings.');
  } else {
    lines.push('| Severity | Location | Rule | Message |', '|---|---|---|---|');
    for (const f of response.findings) {
      lines.push(
        `| ${SEVERITY_LABEL[f.severity]} | ${tableCell(f.location)} | ${tableCell(f.rule)} | ${tableCell(f.message)} |`,
      );
    }
  }
  return `${lines.join('\n')}\n`;
}

/** Short plain-text summary for the terminal. */
export function renderSummary(response: ReviewResponse): string {
  return [
    `=== Review ${sanitizeLine(response.id)} (${modeLabel(response)}) ===`,
    '',
    sanitize(response.summary),
    '',
    `Score: ${response.score}/100, ${response.findings.length} finding(s), ${formatDuration(response.durationMs)}`,
  ].join('\n');
}
