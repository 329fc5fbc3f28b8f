// 공통 상수 정의 (래스터라이저 + 날짜 매핑 + CLI 공용)

// GitHub contribution 그리드: 7일(행) × 52주(열)
export const GRID_ROWS = 7;
export const GRID_WEEKS = 52;

// 글리프 사이 간격(열). 마지막 글리프 뒤에도 붙는다.
export const DEFAULT_SPACING = 1;
// 사전 절단용 평균 글리프 폭. 실제 폭(3~5)과 다를 수 있는 추정치.
export const AVERAGE_CHAR_WIDTH = 4;

// 연도 허용 범위 (양끝 포함)
export const MIN_YEAR = 2000;
export const MAX_YEAR = 2100;

// 커밋 시각: 정오로 고정해 타임존 경계에서 날짜가 밀리지 않게 함
export const COMMIT_TIME = "12:00:00";
export const DEFAULT_COMMIT_MESSAGE = "Commit for {date}";
export const DEFAULT_GIT_BIN = "git";

// 미리보기: 켜진 칸 / 꺼진 칸
export const PREVIEW_ON = "█";
export const PREVIEW_OFF = " ";

// 진행률 출력 주기 (성공 커밋 수 기준)
export const PROGRESS_EVERY = 10;
