import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { GRID_ROWS } from "../config/constants.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const GLYPHS_JSON_PATH = join(__dirname, "..", "..", "assets", "glyphs.json");

/**
 * 7행 픽셀 글리프. 각 행은 "0"/"1" 문자열이고 모든 행의 길이(폭)가 같다.
 * 잉크는 0~4행에만 있고 5, 6행은 빈 패딩.
 */
export type Glyph = readonly string[];

export type GlyphTable = ReadonlyMap<string, Glyph>;

function parseGlyphTable(raw: unknown): GlyphTable {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("Invalid glyph table: expected an object");
  }
  const table = new Map<string, Glyph>();
  for (const [char, rows] of Object.entries(raw)) {
    if (char.length !== 1) {
      throw new Error(`Invalid glyph table: key '${char}' is not one character`);
    }
    if (!Array.isArray(rows) || rows.length !== GRID_ROWS) {
      throw new Error(`Invalid glyph '${char}': expected ${GRID_ROWS} rows`);
    }
    const parsed: string[] = [];
    for (const row of rows) {
      if (typeof row !== "string" || !/^[01]+$/.test(row)) {
        throw new Error(`Invalid glyph '${char}': rows must be 0/1 strings`);
      }
      parsed.push(row);
    }
    if (parsed.some((row) => row.length !== parsed[0].length)) {
      throw new Error(`Invalid glyph '${char}': rows differ in width`);
    }
    table.set(char, Object.freeze(parsed));
  }
  return table;
}

// 프로세스 시작 시 한 번 읽고 이후 변경하지 않음
export const GLYPHS: GlyphTable = parseGlyphTable(
  JSON.parse(readFileSync(GLYPHS_JSON_PATH, "utf-8")),
);

/** 대소문자 무시. 지원하지 않는 문자면 undefined */
export function glyphOf(char: string): Glyph | undefined {
  return GLYPHS.get(char.toLowerCase());
}

/** 글리프 열 수. 지원하지 않는 문자는 0 */
export function widthOf(char: string): number {
  const glyph = glyphOf(char);
  return glyph ? glyph[0].length : 0;
}

export function isSupported(char: string): boolean {
  return glyphOf(char) !== undefined;
}

export function supportedCharacters(): string[] {
  return [...GLYPHS.keys()];
}

/** 지원하지 않는 문자 목록 (소문자화, 중복 제거, 처음 나온 순서) */
export function findUnsupported(text: string): string[] {
  const seen = new Set<string>();
  for (const char of text.toLowerCase()) {
    if (!isSupported(char)) seen.add(char);
  }
  return [...seen];
}
