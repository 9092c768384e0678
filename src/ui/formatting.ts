/**
 * Plain-text layout helpers for command output.
 */

/** One `label: value` line */
export type Field = readonly [label: string, value: string];

/**
 * Lay out fields one per line, values aligned two columns past the
 * longest label.
 *
 * @example
 * ```typescript
 * alignFields([['Target', 'localhost:5010'], ['Protocol', '3']]);
 * // 'Target:   localhost:5010\nProtocol: 3'
 * ```
 */
export function alignFields(fields: readonly Field[]): string {
  const width = Math.max(0, ...fields.map(([label]) => label.length)) + 2;
  return fields.map(([label, value]) => `${label}:`.padEnd(width) + value).join('\n');
}

export function pluralize(count: number, singular: string, plural?: string): string {
  const word = count === 1 ? singular : (plural ?? singular + 's');
  return `${count} ${word}`;
}
