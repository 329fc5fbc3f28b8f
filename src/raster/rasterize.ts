import {
  AVERAGE_CHAR_WIDTH,
  DEFAULT_SPACING,
  GRID_ROWS,
  GRID_WEEKS,
} from "../config/constants.js";
import { glyphOf } from "../glyphs/glyphTable.js";

/** 7행 × W열 비트맵. 모든 행 길이 동일, 0행은 항상 전부 "0" */
export type Bitmap = readonly string[];

export type RasterWarning =
  | { kind: "unsupported-character"; char: string; index: number }
  | {
      kind: "width-exceeded";
      char: string;
      index: number;
      width: number;
      maxWidth: number;
    };

export type RasterizeOptions = {
  maxWidth?: number;
  spacing?: number;
  averageCharWidth?: number;
  /** 경고 수신. 기본은 stderr 출력 */
  onWarning?: (warning: RasterWarning) => void;
};

export function formatWarning(warning: RasterWarning): string {
  switch (warning.kind) {
    case "unsupported-character":
      return `Character '${warning.char}' not supported, skipping.`;
    case "width-exceeded":
      return `Text truncated at '${warning.char}' to fit ${warning.maxWidth}-week graph.`;
  }
}

const printWarning = (warning: RasterWarning): void => {
  console.error(`Warning: ${formatWarning(warning)}`);
};

/**
 * 평균 폭 기준으로 들어갈 수 있는 대략적인 글자 수 (추정치).
 * 실제 폭 검사는 rasterize 루프에서 한다.
 */
export function maxCharsFor(
  maxWidth: number = GRID_WEEKS,
  averageCharWidth: number = AVERAGE_CHAR_WIDTH,
  spacing: number = DEFAULT_SPACING,
): number {
  const perChar = averageCharWidth + spacing;
  if (perChar <= 0) return Number.POSITIVE_INFINITY;
  return Math.floor(maxWidth / perChar);
}

/**
 * 텍스트 → 7행 비트맵.
 * - 지원하지 않는 문자는 경고 후 건너뜀 (폭 소모 없음)
 * - 다음 글리프가 maxWidth를 넘으면 경고 후 거기서 중단, 그때까지 결과 반환
 * - 마지막에 전체를 한 행 아래로 내림 (빈 행 삽입 + 마지막 행 버림)
 */
export function rasterize(text: string, options: RasterizeOptions = {}): Bitmap {
  const {
    maxWidth = GRID_WEEKS,
    spacing = DEFAULT_SPACING,
    averageCharWidth = AVERAGE_CHAR_WIDTH,
    onWarning = printWarning,
  } = options;

  const chars = Array.from(text.toLowerCase()).slice(
    0,
    maxCharsFor(maxWidth, averageCharWidth, spacing),
  );
  const gap = "0".repeat(spacing);

  const rows: string[] = Array.from({ length: GRID_ROWS }, () => "");
  let totalWidth = 0;

  for (let index = 0; index < chars.length; index++) {
    const char = chars[index];
    const glyph = glyphOf(char);
    if (!glyph) {
      onWarning({ kind: "unsupported-character", char, index });
      continue;
    }

    const charWidth = glyph[0].length + spacing;
    if (totalWidth + charWidth > maxWidth) {
      onWarning({
        kind: "width-exceeded",
        char,
        index,
        width: totalWidth,
        maxWidth,
      });
      break;
    }

    for (let r = 0; r < GRID_ROWS; r++) {
      rows[r] += glyph[r] + gap;
    }
    totalWidth += charWidth;
  }

  return ["0".repeat(totalWidth), ...rows.slice(0, GRID_ROWS - 1)];
}

export function bitmapWidth(bitmap: Bitmap): number {
  return bitmap[0]?.length ?? 0;
}

/** 0열이면 렌더링할 것이 없음 */
export function isEmptyBitmap(bitmap: Bitmap): boolean {
  return bitmapWidth(bitmap) === 0;
}

export function countLitCells(bitmap: Bitmap): number {
  let count = 0;
  for (const row of bitmap) {
    for (const cell of row) if (cell === "1") count++;
  }
  return count;
}
