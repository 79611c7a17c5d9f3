import path from 'path';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const DATE_FOLDER_REGEX = /^(\d{1,2})-([A-Za-z]{3})-(\d{2})$/;
const ARTIFACT_FILE_REGEX = /^(.+)_(\d{3,})_(\d{8})_(\d{6})(?:_(\d+))?\.xlsx$/i;

export const MAX_COLLISION_SUFFIX = 1000;

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/** Date folder name such as `6-Jan-26` (day without leading zero, local time). */
export function getDateFolderName(date: Date): string {
  return `${date.getDate()}-${MONTHS[date.getMonth()]}-${pad(date.getFullYear() % 100)}`;
}

export function parseDateFolderName(name: string): Date | null {
  const match = name.match(DATE_FOLDER_REGEX);
  if (!match) {
    return null;
  }
  const month = MONTHS.findIndex(entry => entry.toLowerCase() === match[2].toLowerCase());
  if (month === -1) {
    return null;
  }
  const day = Number.parseInt(match[1], 10);
  const date = new Date(2000 + Number.parseInt(match[3], 10), month, day);
  return date.getDate() === day ? date : null;
}

export function getArtifactFileName(prefix: string, palletNumber: number, completedAt: Date, suffix = 0): string {
  const datePart = `${completedAt.getFullYear()}${pad(completedAt.getMonth() + 1)}${pad(completedAt.getDate())}`;
  const timePart = `${pad(completedAt.getHours())}${pad(completedAt.getMinutes())}${pad(completedAt.getSeconds())}`;
  const collision = suffix > 0 ? `_${suffix}` : '';
  return `${prefix}_${pad(palletNumber, 3)}_${datePart}_${timePart}${collision}.xlsx`;
}

export function getArtifactDir(root: string, completedAt: Date): string {
  return path.join(root, getDateFolderName(completedAt));
}

export function getArtifactPath(root: string, prefix: string, palletNumber: number, completedAt: Date): string {
  return path.join(getArtifactDir(root, completedAt), getArtifactFileName(prefix, palletNumber, completedAt));
}

export interface ParsedArtifactName {
  prefix: string;
  palletNumber: number;
  date: string;
  time: string;
  suffix?: number;
}

export function parseArtifactFileName(fileName: string): ParsedArtifactName | null {
  const match = fileName.match(ARTIFACT_FILE_REGEX);
  if (!match) {
    return null;
  }

  const parsed: ParsedArtifactName = {
    prefix: match[1],
    palletNumber: Number.parseInt(match[2], 10),
    date: match[3],
    time: match[4]
  };
  if (match[5] !== undefined) {
    parsed.suffix = Number.parseInt(match[5], 10);
  }
  return parsed;
}
