import { loadConfig, type AppConfig, type Env } from "../config/env.js";
import { ContribTextError } from "../errors.js";
import {
  consoleReporter,
  previewText,
  writeTextToHistory,
  type Reporter,
} from "../app/writeText.js";
import { createGitRecordStore, type RecordStore } from "../git/gitRecorder.js";
import { findUnsupported } from "../glyphs/glyphTable.js";
import { formatWarning, type RasterWarning } from "../raster/rasterize.js";
import { parseArgs, usage } from "./parseArgs.js";

export type CliDeps = {
  env?: Env;
  reporter?: Reporter;
  /** 오류·경고 출력 */
  errorLog?: (message: string) => void;
  createStore?: (config: AppConfig) => RecordStore;
};

const defaultCreateStore = (config: AppConfig): RecordStore =>
  createGitRecordStore({
    gitBin: config.gitBin,
    messageTemplate: config.messageTemplate,
  });

/** 종료 코드를 반환한다. process.exit은 엔트리포인트에서. */
export function runCli(argv: string[], deps: CliDeps = {}): number {
  const reporter = deps.reporter ?? consoleReporter;
  const errorLog = deps.errorLog ?? ((message: string) => console.error(message));
  const createStore = deps.createStore ?? defaultCreateStore;

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    if (parsed.message) errorLog(`Error: ${parsed.message}`);
    reporter.log(usage());
    return parsed.help ? 0 : 1;
  }

  const { text, year, preview } = parsed.options;
  const config = loadConfig(deps.env);
  const onWarning = (warning: RasterWarning) =>
    errorLog(`Warning: ${formatWarning(warning)}`);

  const unsupported = findUnsupported(text);
  if (unsupported.length > 0) {
    reporter.log(
      `Warning: Unsupported characters will be skipped: ${unsupported.map((c) => `'${c}'`).join(", ")}`,
    );
  }

  try {
    if (preview) {
      reporter.log(previewText(text, { spacing: config.spacing, onWarning }));
      return 0;
    }
    // 개별 커밋 실패는 요약에만 반영, 종료 코드는 0
    writeTextToHistory(text, year, createStore(config), {
      spacing: config.spacing,
      reporter,
      onWarning,
    });
    return 0;
  } catch (err) {
    if (err instanceof ContribTextError) {
      errorLog(`Error: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }
}
