import { COMMIT_TIME, GRID_ROWS } from "../config/constants.js";
import type { Bitmap } from "../raster/rasterize.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** 비트맵 칸 → 날짜. x = 주(열), y = 요일(행, 0 = Sunday) */
export type LitCell = {
  row: number;
  col: number;
  date: Date;
};

/** 해당 연도 1월 1일 이후(포함) 첫 일요일 (UTC 자정) */
export function firstSundayOf(year: number): Date {
  const d = new Date(0);
  d.setUTCFullYear(year, 0, 1);
  const offset = (7 - d.getUTCDay()) % 7;
  return new Date(d.getTime() + offset * DAY_MS);
}

/** anchor + (col × 7 + row)일 */
export function cellDate(anchor: Date, row: number, col: number): Date {
  return new Date(anchor.getTime() + (col * 7 + row) * DAY_MS);
}

/** "YYYY-MM-DD" (UTC) */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** git --date 인자: "YYYY-MM-DDT12:00:00" */
export function toCommitTimestamp(date: Date): string {
  return `${toDateString(date)}T${COMMIT_TIME}`;
}

/**
 * 켜진 칸을 커밋 순서대로 나열: 열 0..W-1, 열 안에서 행 0..6.
 * GitHub 그리드와 같은 column-major 순서.
 */
export function litCellDates(bitmap: Bitmap, year: number): LitCell[] {
  const anchor = firstSundayOf(year);
  const width = bitmap[0]?.length ?? 0;
  const cells: LitCell[] = [];
  for (let col = 0; col < width; col++) {
    for (let row = 0; row < GRID_ROWS; row++) {
      if (bitmap[row]?.[col] === "1") {
        cells.push({ row, col, date: cellDate(anchor, row, col) });
      }
    }
  }
  return cells;
}
