import type { TopicResult } from '../pipeline/types.js';

const RULE = '='.repeat(50);

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** Plain-text report of a run's results, one section per topic. */
export function renderTextReport(
  results: readonly TopicResult[],
  sourceName: string,
  generatedAt: Date = new Date(),
): string {
  const lines: string[] = [
    'INTERVIEW PREPARATION RESULTS',
    RULE,
    `Generated on: ${formatTimestamp(generatedAt)}`,
    `Source File:  ${sourceName}`,
    RULE,
    '',
  ];

  for (const result of results) {
    const heading = `SKILL: ${result.topic}`;
    lines.push(heading, '-'.repeat(heading.length));
    if (result.items.length === 0) {
      lines.push('No questions generated.');
    } else {
      result.items.forEach((item, i) => lines.push(`${i + 1}. ${item}`));
    }
    lines.push('', RULE, '');
  }
  return lines.join('\n');
}

export function reportFilename(sourceName: string): string {
  const base = sourceName.replace(/\.[^.]+$/, '').replace(/[^A-Za-z0-9._-]+/g, '_') || 'interview';
  return `${base}_results.txt`;
}
