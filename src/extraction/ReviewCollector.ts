/**
 * Review Collector
 *
 * SOLID 원칙:
 * - SRP: 수집 루프 실행 + 결과 저장만 담당 (브라우저 X)
 *
 * 수집 루프가 치명적으로 실패하면 그때까지의 리뷰를 먼저 저장하고 원래 에러 전파
 * 부분 결과 저장 실패는 로그만 남김 (원래 에러 우선)
 */

import type { Logger } from "@/config/logger";
import type { ExtractionResult } from "@/core/domain/ExtractionResult";
import type { ReviewRecord } from "@/core/domain/ReviewRecord";
import { ScrapeInput, toMaxCount } from "@/core/domain/ScrapeInput";
import type { IReviewContainer } from "@/core/interfaces/IReviewContainer";
import type { IReviewWriter } from "@/core/interfaces/IReviewWriter";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { createComponentLogger } from "@/utils/LoggerContext";
import { IncrementalExtractor } from "./IncrementalExtractor";

export type CollectInput = Pick<ScrapeInput, "maxReviews" | "stopCriteria" | "saveReviews">;

export class ReviewCollector {
  private readonly log: Logger;

  constructor(
    private readonly writer: IReviewWriter,
    private readonly idleIterationLimit: number,
    log?: Logger,
  ) {
    this.log = log ?? createComponentLogger("ReviewCollector");
  }

  async collect(container: IReviewContainer, input: CollectInput): Promise<ExtractionResult> {
    let result: ExtractionResult;
    try {
      result = await new IncrementalExtractor(this.log).extract(container, {
        maxCount: toMaxCount(input.maxReviews),
        stopCriterion: input.stopCriteria,
        idleIterationLimit: this.idleIterationLimit,
      });
    } catch (error) {
      const scrapeError = ScrapeError.wrap(error, ScrapeErrorType.CONTAINER_ACCESS_FAILED);
      if (input.saveReviews && scrapeError.partialRecords.length > 0) {
        await this.flushPartial(scrapeError.partialRecords);
      }
      throw scrapeError;
    }

    if (input.saveReviews) {
      await this.writer.prepare();
      await this.writer.writeReviews(result.records);
    }
    return result;
  }

  private async flushPartial(records: readonly ReviewRecord[]): Promise<void> {
    try {
      await this.writer.prepare();
      await this.writer.writeReviews(records);
      this.log.warn({ partialRecords: records.length }, "수집 중단, 부분 결과 저장 완료");
    } catch (flushError) {
      this.log.error(
        { error: flushError instanceof Error ? flushError.message : String(flushError) },
        "부분 결과 저장 실패",
      );
    }
  }
}
