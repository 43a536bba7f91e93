import fs from 'fs';
import path from 'path';
import { errorMessage } from './errors.js';
import { log as rootLog, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Output files: <stamp>_<coin>_<kind>_<userId>.json (+ .png beside it)
// ---------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMM */
export function fileStamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}`
  );
}

export interface OutputName {
  stamp: string;
  coinType: string;
  kind: string;
  userId: string;
}

/** File name without extension; path separators in the parts become "-" */
export function outputBaseName(name: OutputName): string {
  return [name.stamp, name.coinType, name.kind, name.userId]
    .map(part => part.replace(/[\\/]/g, '-'))
    .join('_');
}

/** Write `data` as two-space JSON; returns the path, or null when the write failed */
export function writeJson(
  dir: string,
  baseName: string,
  data: unknown,
  log: Logger = rootLog
): string | null {
  const file = path.join(dir, `${baseName}.json`);
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(file, JSON.stringify(data, null, 2));
    log.info(`Saved ${path.basename(file)}`);
    return file;
  } catch (error) {
    log.error(`Could not write ${file}: ${errorMessage(error)}`);
    return null;
  }
}
