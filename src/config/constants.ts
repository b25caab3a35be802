/**
 * 애플리케이션 설정 상수
 */

/**
 * 애플리케이션 메타데이터
 * ⚠️ package.json의 version과 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Place Review Scraper",
  CLI_NAME: "review-scraper",
} as const;

/**
 * 리뷰 비교 설정
 */
export const REVIEW_MATCH_CONFIG = {
  /** 중복 판별/중단 조건 비교 시 사용하는 텍스트 앞부분 길이 */
  BOUNDED_PREFIX_LENGTH: 50,

  /** identity key 구분자 (화면 텍스트에 나올 수 없는 문자) */
  KEY_SEPARATOR: "\u0000",
} as const;

/**
 * 스크래핑 기본값 (config.yml에서 덮어쓰기 가능)
 */
export const SCRAPER_CONFIG = {
  /** 기본 설정 파일 경로 */
  DEFAULT_CONFIG_PATH: "config.yml",

  /** 기본 사이트 설정 */
  DEFAULT_SITE: "google",

  /** 페이지 이동 타임아웃 (ms) */
  NAVIGATION_TIMEOUT_MS: 60_000,

  /** 요소 표시 대기 타임아웃 (ms) */
  ELEMENT_TIMEOUT_MS: 10_000,

  /** 평점 요약 영역 대기 타임아웃 (ms) */
  SUMMARY_TIMEOUT_MS: 100_000,

  /** 클릭 후 UI 안정화 대기 (ms) */
  UI_SETTLE_MS: 2_000,

  /** 차단 페이지 재확인 주기 (ms) */
  BLOCKED_POLL_MS: 5_000,

  /** 전체 화면 모드 진입 후 리뷰 로딩 대기 (ms) */
  REVIEWS_LOAD_WAIT_MS: 10_000,

  /** 다이얼로그 모드 viewport */
  DIALOG_VIEWPORT: { width: 1200, height: 800 },

  /** 이미지 해상도 치환값 */
  IMAGE_SIZE_TOKEN: "w800-h800",
} as const;

/**
 * 경로 설정
 */
export const PATH_CONFIG = {
  /** 사이트 설정 YAML 디렉토리 (config/ 기준) */
  SITES_DIR: "sites",

  /** HTML 덤프 하위 디렉토리 (로그 디렉토리 기준) */
  HTML_DUMP_DIR: "html",
} as const;
