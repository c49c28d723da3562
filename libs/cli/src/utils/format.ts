/**
 * Plain-text rendering of command results
 */

import type { ListResult, SecretMode } from '@shrine/ipc';
import type { ShrineInfo } from '@shrine/storage';

const MODE_LABELS: Record<SecretMode, string> = {
  text: 'txt',
  binary: 'bin',
};

/** `YYYY-MM-DD` and `HH:MM` of an ISO timestamp, in UTC */
function splitTimestamp(iso: string | undefined): [string, string] {
  if (!iso) return ['', ''];
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return ['', ''];
  const text = date.toISOString();
  return [text.slice(0, 10), text.slice(11, 16)];
}

/**
 * `total N`, then one line per entry:
 * mode, creator, created date and time, updater, updated date and time, path.
 */
export function formatList(result: ListResult): string[] {
  const createdWidth = Math.max(0, ...result.entries.map((entry) => entry.createdBy.length));
  const updatedWidth = Math.max(0, ...result.entries.map((entry) => entry.updatedBy?.length ?? 0));

  const lines = [`total ${result.total}`];
  for (const entry of result.entries) {
    const [createdDate, createdTime] = splitTimestamp(entry.createdAt);
    const [updatedDate, updatedTime] = splitTimestamp(entry.updatedAt);
    lines.push(
      [
        MODE_LABELS[entry.mode],
        entry.createdBy.padEnd(createdWidth),
        createdDate,
        createdTime,
        (entry.updatedBy ?? '').padEnd(updatedWidth),
        updatedDate.padEnd(10),
        updatedTime.padEnd(5),
        entry.path,
      ].join(' '),
    );
  }
  return lines;
}

export const INFO_FIELDS = ['path', 'version', 'uuid', 'encryption', 'kdf', 'iterations'] as const;
export type InfoField = (typeof INFO_FIELDS)[number];

export function isInfoField(value: string): value is InfoField {
  return INFO_FIELDS.some((field) => field === value);
}

export function formatInfo(info: ShrineInfo): string[] {
  return [
    `File:          ${info.path}`,
    `Version:       ${info.version}`,
    `UUID:          ${info.uuid}`,
    `Encryption:    ${info.encryption}`,
    `KDF:           ${info.kdf === undefined ? '-' : `${info.kdf} (${info.iterations ?? 0} iterations)`}`,
  ];
}

/**
 * One field as `info --field` prints it; `-` when the shrine has none.
 */
export function formatInfoField(info: ShrineInfo, field: InfoField): string {
  return String(info[field] ?? '-');
}
