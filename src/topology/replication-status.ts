import { StatusParseError } from '../runner/errors.js';

/** A coordinate in the master's binary log. */
export interface BinlogPosition {
  readonly file: string;
  readonly position: number;
}

const ROW_HEADER = /^\*+ \d+\. row \*+$/;
const FIELD = /^\s*([A-Za-z_]+):\s?(.*)$/;

/** Columns of the first row of `\G` output, keyed by column name. */
export function parseVerticalRow(stdout: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of stdout.split('\n')) {
    if (ROW_HEADER.test(line.trim())) {
      if (fields.size > 0) break;
      continue;
    }
    const match = FIELD.exec(line);
    if (match && !fields.has(match[1])) {
      fields.set(match[1], match[2].trim());
    }
  }
  return fields;
}

function readPosition(stdout: string, fileColumn: string, positionColumn: string): BinlogPosition | null {
  if (stdout.trim() === '') {
    return null;
  }

  const fields = parseVerticalRow(stdout);
  const file = fields.get(fileColumn);
  const position = fields.get(positionColumn);
  if (!file || position === undefined || !/^\d+$/.test(position)) {
    throw new StatusParseError(`expected ${fileColumn} and ${positionColumn} in status output`, stdout);
  }
  return { file, position: Number(position) };
}

/** `SHOW MASTER STATUS\G`. Empty output: binary logging is off. */
export function parseMasterStatus(stdout: string): BinlogPosition | null {
  return readPosition(stdout, 'File', 'Position');
}

/**
 * Master coordinates a replica has executed up to, from `SHOW SLAVE STATUS\G`.
 * Empty output: not a replica.
 */
export function parseReplicaPosition(stdout: string): BinlogPosition | null {
  return readPosition(stdout, 'Relay_Master_Log_File', 'Exec_Master_Log_Pos');
}

export function samePosition(a: BinlogPosition, b: BinlogPosition): boolean {
  return a.file === b.file && a.position === b.position;
}
