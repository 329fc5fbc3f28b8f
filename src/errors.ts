/** 렌더링/기록 시작 전에 중단해야 하는 치명적 오류의 공통 부모 */
export class ContribTextError extends Error {
  exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "ContribTextError";
    this.exitCode = exitCode;
  }
}

export class InvalidYearError extends ContribTextError {
  year: number;

  constructor(year: number, minYear: number, maxYear: number) {
    super(
      `Year ${year} seems unusual. Please use a year between ${minYear}-${maxYear}.`,
    );
    this.name = "InvalidYearError";
    this.year = year;
  }
}

export class EmptyResultError extends ContribTextError {
  constructor() {
    super("No valid characters to render.");
    this.name = "EmptyResultError";
  }
}

export class PreconditionMissingError extends ContribTextError {
  constructor(message = "Not in a git repository. Run 'git init' first.") {
    super(message);
    this.name = "PreconditionMissingError";
  }
}
