import { GRID_WEEKS, PREVIEW_OFF, PREVIEW_ON } from "../config/constants.js";
import { bitmapWidth, type Bitmap } from "../raster/rasterize.js";

// 터미널 미리보기 문자열. 출력은 호출 측(CLI)에서.
export function renderPreview(bitmap: Bitmap, maxWidth: number = GRID_WEEKS): string {
  const lines = bitmap.map((row) =>
    Array.from(row, (cell) => (cell === "1" ? PREVIEW_ON : PREVIEW_OFF)).join(""),
  );
  return [
    "",
    "Preview (7 rows × width):",
    ...lines,
    "",
    `Total width: ${bitmapWidth(bitmap)} columns (max: ${maxWidth})`,
    "",
  ].join("\n");
}
