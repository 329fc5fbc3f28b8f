import {
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_GIT_BIN,
  DEFAULT_SPACING,
} from "./constants.js";

export type Env = Record<string, string | undefined>;

/** .env / 환경변수로 바꿀 수 있는 실행 설정 */
export type AppConfig = {
  gitBin: string;
  messageTemplate: string;
  spacing: number;
};

function parseSpacing(raw: string | undefined): number {
  const value = raw?.trim();
  if (!value || !/^\d+$/.test(value)) return DEFAULT_SPACING;
  return Number.parseInt(value, 10);
}

/**
 * 환경변수 맵에서 설정을 읽는다. 값이 없거나 잘못되면 기본값.
 * dotenv 로딩은 엔트리포인트(`src/index.ts`)에서 한 번만 한다.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    gitBin: env.CONTRIB_TEXT_GIT_BIN?.trim() || DEFAULT_GIT_BIN,
    messageTemplate: env.CONTRIB_TEXT_MESSAGE || DEFAULT_COMMIT_MESSAGE,
    spacing: parseSpacing(env.CONTRIB_TEXT_SPACING),
  };
}
