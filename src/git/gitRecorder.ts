import { spawnSync } from "child_process";
import { DEFAULT_COMMIT_MESSAGE, DEFAULT_GIT_BIN } from "../config/constants.js";

/**
 * 날짜별 기록 저장소.
 * 기본 구현은 git 빈 커밋. 테스트에서는 가짜 구현을 주입한다.
 */
export interface RecordStore {
  /** 기록을 만들 수 있는 상태인지 (git: 저장소 안인지) */
  isReady(): boolean;
  /** timestamp: "YYYY-MM-DDTHH:MM:SS". 실패해도 throw 하지 않고 false */
  recordAt(timestamp: string): boolean;
}

export type GitRecordStoreOptions = {
  gitBin?: string;
  /** `{date}` 자리에 timestamp */
  messageTemplate?: string;
  cwd?: string;
};

export function formatCommitMessage(template: string, timestamp: string): string {
  return template.split("{date}").join(timestamp);
}

export function createGitRecordStore(
  options: GitRecordStoreOptions = {},
): RecordStore {
  const gitBin = options.gitBin ?? DEFAULT_GIT_BIN;
  const template = options.messageTemplate ?? DEFAULT_COMMIT_MESSAGE;

  const run = (args: string[]): boolean => {
    const result = spawnSync(gitBin, args, {
      cwd: options.cwd,
      encoding: "utf-8",
      stdio: "pipe",
    });
    // 실행 자체가 실패한 경우(ENOENT 등)는 result.error, status는 null
    return !result.error && result.status === 0;
  };

  return {
    isReady: () => run(["rev-parse", "--git-dir"]),
    recordAt: (timestamp) =>
      run([
        "commit",
        "--allow-empty",
        "-m",
        formatCommitMessage(template, timestamp),
        "--date",
        timestamp,
      ]),
  };
}
