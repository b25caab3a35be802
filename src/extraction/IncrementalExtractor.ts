/**
 * Incremental Extractor
 *
 * 스크롤 → 새 요소 파싱 → 중복 제거 → 종료 조건 확인 반복
 *
 * 종료 조건 (모두 정상 종료):
 * 1. 중단 조건 리뷰 발견 (해당 리뷰까지 포함)
 * 2. maxCount 도달
 * 3. 새 요소 없음 + 스크롤 높이 변화 없음이 idleIterationLimit회 연속
 *
 * 컨테이너 접근 실패(count/scroll/extent)는 치명적 오류:
 * 지금까지 수집한 레코드를 담아 ScrapeError로 전달
 */

import type { Logger } from "@/config/logger";
import type { ExtractionResult, StopReason } from "@/core/domain/ExtractionResult";
import { ReviewRecord, reviewIdentityKey } from "@/core/domain/ReviewRecord";
import { StopCriterion, matchesStopCriterion } from "@/core/domain/StopCriterion";
import type { IReviewContainer } from "@/core/interfaces/IReviewContainer";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { createComponentLogger } from "@/utils/LoggerContext";

export interface ExtractOptions {
  /** 최대 레코드 수 (없거나 0 이하: 제한 없음) */
  maxCount?: number;
  stopCriterion?: StopCriterion;
  /** 연속 idle 반복 허용 횟수 (기본 1) */
  idleIterationLimit?: number;
}

export class IncrementalExtractor {
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? createComponentLogger("IncrementalExtractor");
  }

  async extract(
    container: IReviewContainer,
    options: ExtractOptions = {},
  ): Promise<ExtractionResult> {
    const maxCount =
      options.maxCount !== undefined && options.maxCount > 0
        ? options.maxCount
        : undefined;
    const idleLimit = Math.max(1, options.idleIterationLimit ?? 1);

    const records: ReviewRecord[] = [];
    const seen = new Set<string>();
    let nextIndex = 0;
    let previousExtent: number | undefined;
    let idleIterations = 0;
    let iterations = 0;
    let duplicates = 0;
    let skipped = 0;

    const guard = <T>(operation: string, call: () => Promise<T>): Promise<T> =>
      call().catch((error: unknown) => {
        throw new ScrapeError(
          ScrapeErrorType.CONTAINER_ACCESS_FAILED,
          `Review container ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error, partialRecords: [...records] },
        );
      });

    const finish = (reason: StopReason): ExtractionResult => {
      this.log.info(
        { reason, records: records.length, iterations, duplicates, skipped },
        "리뷰 추출 종료",
      );
      return { records, reason, iterations, duplicates, skipped };
    };

    for (;;) {
      iterations++;
      const count = await guard("count", () => container.countRendered());

      // 가상화로 요소가 줄어든 경우 처음부터 다시 훑음 (중복은 identity key로 제거)
      if (count < nextIndex) {
        this.log.debug({ count, nextIndex }, "렌더링 요소 감소, 재탐색");
        nextIndex = 0;
      }

      let appended = 0;
      for (let index = nextIndex; index < count; index++) {
        const record = await this.parseSafely(container, index);
        if (record === null) {
          skipped++;
          continue;
        }

        const key = reviewIdentityKey(record);
        if (seen.has(key)) {
          duplicates++;
          continue;
        }
        seen.add(key);
        records.push(record);
        appended++;

        if (options.stopCriterion && matchesStopCriterion(record, options.stopCriterion)) {
          return finish("stop_criterion");
        }
        if (maxCount !== undefined && records.length >= maxCount) {
          return finish("max_count");
        }
      }
      nextIndex = count;

      const extent = await guard("extent", () => container.scrollExtent());
      const grew = previousExtent === undefined || extent > previousExtent;
      previousExtent = extent;

      if (appended === 0 && !grew) {
        idleIterations++;
        this.log.debug({ idleIterations, idleLimit, extent }, "새 리뷰 없음");
        if (idleIterations >= idleLimit) {
          return finish("exhausted");
        }
      } else {
        idleIterations = 0;
        this.log.debug({ appended, total: records.length, extent }, "리뷰 추출 진행");
      }

      await guard("scroll", () => container.scrollForMore());
    }
  }

  /**
   * 요소 하나 파싱 (실패는 건너뜀)
   */
  private async parseSafely(
    container: IReviewContainer,
    index: number,
  ): Promise<ReviewRecord | null> {
    try {
      const record = await container.parseAt(index);
      if (record === null) {
        this.log.debug({ index }, "필수 필드 없음, 요소 건너뜀");
      }
      return record;
    } catch (error) {
      this.log.warn(
        { index, error: error instanceof Error ? error.message : String(error) },
        "리뷰 요소 파싱 실패, 건너뜀",
      );
      return null;
    }
  }
}
