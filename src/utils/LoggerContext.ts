/**
 * 로거 컨텍스트 유틸리티
 *
 * 스크래핑 실행 단위 컨텍스트 로거 생성
 */

import { logger, Logger } from "@/config/logger";

/**
 * 실행(run) 전용 로거 생성
 * @param runId - 실행 ID (장소명 + 타임스탬프)
 * @param sortBy - 정렬 옵션
 */
export function createRunLogger(runId: string, sortBy: string): Logger {
  return logger.child({
    run_id: runId,
    sort_by: sortBy,
  });
}

/**
 * 컴포넌트 전용 로거 생성
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}
