/**
 * Scrape Error Type
 *
 * 목적:
 * - 실패 원인 세분화
 * - 치명적 오류와 부분 결과(partialRecords) 전달
 */

import type { ReviewRecord } from "@/core/domain/ReviewRecord";

/**
 * 스크래핑 에러 타입
 */
export enum ScrapeErrorType {
  /** 설정 파일 오류 (YAML 파싱, 스키마 검증) */
  CONFIG_INVALID = "CONFIG_INVALID",

  /** 입력값 오류 (CLI 인자, 정렬 옵션) */
  INPUT_INVALID = "INPUT_INVALID",

  /** 브라우저 실행/컨텍스트 생성 실패 */
  BROWSER_ERROR = "BROWSER_ERROR",

  /** 페이지 이동, 리뷰 버튼/정렬 메뉴 탐색 실패 */
  NAVIGATION_FAILED = "NAVIGATION_FAILED",

  /** 리뷰 컨테이너 조회/스크롤 실패 (세션 끊김 등) */
  CONTAINER_ACCESS_FAILED = "CONTAINER_ACCESS_FAILED",

  /** CSV 출력 실패 */
  OUTPUT_FAILED = "OUTPUT_FAILED",

  /** 알 수 없는 에러 */
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * Scrape Error 클래스
 */
export class ScrapeError extends Error {
  public readonly type: ScrapeErrorType;
  public readonly errorCause?: Error;
  /** 치명적 오류 발생 전까지 수집된 리뷰 */
  public readonly partialRecords: ReviewRecord[];

  constructor(
    type: ScrapeErrorType,
    message: string,
    options?: {
      cause?: unknown;
      partialRecords?: ReviewRecord[];
    },
  ) {
    super(message);
    this.name = "ScrapeError";
    this.type = type;
    this.errorCause = toError(options?.cause);
    this.partialRecords = options?.partialRecords ?? [];
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      cause: this.errorCause?.message,
      partialRecords: this.partialRecords.length,
      stack: this.stack,
    };
  }

  /**
   * 임의의 에러를 ScrapeError로 변환 (이미 ScrapeError면 그대로 반환)
   */
  static wrap(
    error: unknown,
    type: ScrapeErrorType = ScrapeErrorType.UNKNOWN_ERROR,
    message?: string,
  ): ScrapeError {
    if (error instanceof ScrapeError) {
      return error;
    }
    const cause = toError(error);
    return new ScrapeError(type, message ?? cause?.message ?? String(error), {
      cause,
    });
  }
}

function toError(value: unknown): Error | undefined {
  if (value === undefined) return undefined;
  return value instanceof Error ? value : new Error(String(value));
}
