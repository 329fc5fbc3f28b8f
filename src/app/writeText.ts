import { MAX_YEAR, MIN_YEAR, PROGRESS_EVERY } from "../config/constants.js";
import {
  EmptyResultError,
  InvalidYearError,
  PreconditionMissingError,
} from "../errors.js";
import type { RecordStore } from "../git/gitRecorder.js";
import { litCellDates, toCommitTimestamp } from "../grid/dateMapper.js";
import { renderPreview } from "../preview/renderPreview.js";
import {
  countLitCells,
  isEmptyBitmap,
  rasterize,
  type Bitmap,
  type RasterizeOptions,
} from "../raster/rasterize.js";

/** 진행 상황 출력 대상. 기본은 콘솔 */
export type Reporter = {
  log(message: string): void;
  /** 같은 줄을 덮어쓰는 진행률 */
  progress(message: string): void;
};

export const consoleReporter: Reporter = {
  log: (message) => console.log(message),
  progress: (message) => {
    process.stdout.write(`${message}\r`);
  },
};

export type EmissionSummary = {
  total: number;
  succeeded: number;
  failed: number;
};

export type WriteTextOptions = Pick<
  RasterizeOptions,
  "spacing" | "maxWidth" | "onWarning"
> & {
  reporter?: Reporter;
};

export function validateYear(year: number): void {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new InvalidYearError(year, MIN_YEAR, MAX_YEAR);
  }
}

/** 렌더링할 칸이 하나도 없으면 EmptyResultError */
export function rasterizeOrFail(text: string, options: RasterizeOptions = {}): Bitmap {
  const bitmap = rasterize(text, options);
  if (isEmptyBitmap(bitmap)) throw new EmptyResultError();
  return bitmap;
}

export function previewText(text: string, options: WriteTextOptions = {}): string {
  const bitmap = rasterizeOrFail(text, options);
  return renderPreview(bitmap, options.maxWidth);
}

/**
 * 켜진 칸마다 recordAt 한 번씩, column-major 순서로 순차 호출.
 * 개별 실패는 세기만 하고 계속 진행한다.
 */
export function emitRecords(
  bitmap: Bitmap,
  year: number,
  store: RecordStore,
  reporter: Reporter = consoleReporter,
): EmissionSummary {
  const cells = litCellDates(bitmap, year);
  const total = cells.length;
  let succeeded = 0;
  let failed = 0;

  for (const cell of cells) {
    if (store.recordAt(toCommitTimestamp(cell.date))) {
      succeeded++;
      if (succeeded % PROGRESS_EVERY === 0 || succeeded === total) {
        reporter.progress(`Progress: ${succeeded}/${total} commits`);
      }
    } else {
      failed++;
    }
  }

  const failedNote = failed > 0 ? ` (${failed} failed)` : "";
  reporter.log(`\nCompleted: ${succeeded} commits generated${failedNote}`);
  return { total, succeeded, failed };
}

/**
 * 텍스트를 해당 연도 contribution 그리드에 새긴다.
 * 연도·저장소·빈 결과 검사는 모두 첫 기록 전에 끝난다.
 */
export function writeTextToHistory(
  text: string,
  year: number,
  store: RecordStore,
  options: WriteTextOptions = {},
): EmissionSummary {
  const { reporter = consoleReporter, ...rasterOptions } = options;

  validateYear(year);
  if (!store.isReady()) throw new PreconditionMissingError();

  const bitmap = rasterizeOrFail(text, rasterOptions);
  reporter.log(`Generating ${countLitCells(bitmap)} commits for '${text}' in ${year}...`);

  return emitRecords(bitmap, year, store, reporter);
}
