/**
 * ReviewCollector Test
 *
 * 목적: 수집 결과 저장 + 치명적 실패 시 부분 결과 저장 검증
 */

import { describe, it, expect } from "@jest/globals";
import type { OverallRating } from "@/core/domain/OverallRating";
import type { ReviewRecord } from "@/core/domain/ReviewRecord";
import type { IReviewWriter } from "@/core/interfaces/IReviewWriter";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { CollectInput, ReviewCollector } from "@/extraction/ReviewCollector";
import { FakeReviewContainer, makeReviews } from "../helpers/FakeReviewContainer";

class RecordingWriter implements IReviewWriter {
  prepared = 0;
  readonly written: ReviewRecord[][] = [];

  constructor(private readonly failWrites: boolean = false) {}

  async prepare(): Promise<void> {
    this.prepared++;
  }

  async writeMetadata(_rating: OverallRating): Promise<void> {}

  async writeReviews(records: readonly ReviewRecord[]): Promise<void> {
    if (this.failWrites) {
      throw new Error("ENOSPC: no space left on device");
    }
    this.written.push([...records]);
  }
}

const INPUT: CollectInput = { maxReviews: -1, stopCriteria: undefined, saveReviews: true };

/** 두 번째 스크롤에서 세션이 끊기는 목록 (그 전까지 4개 노출) */
function disconnectingContainer(): FakeReviewContainer {
  return new FakeReviewContainer(makeReviews(6), {
    reveal: (scrolls) => (scrolls + 1) * 2,
    failScrollOnCall: 2,
  });
}

async function collectError(
  collector: ReviewCollector,
  container: FakeReviewContainer,
  input: CollectInput = INPUT,
): Promise<ScrapeError> {
  try {
    await collector.collect(container, input);
  } catch (error) {
    if (error instanceof ScrapeError) {
      return error;
    }
    throw error;
  }
  throw new Error("collect should have failed");
}

describe("ReviewCollector", () => {
  it("정상 종료 시 수집한 리뷰를 한 번에 저장해야 함", async () => {
    const writer = new RecordingWriter();

    const result = await new ReviewCollector(writer, 1).collect(
      new FakeReviewContainer(makeReviews(3)),
      INPUT,
    );

    expect(result.reason).toBe("exhausted");
    expect(writer.prepared).toBe(1);
    expect(writer.written).toEqual([makeReviews(3)]);
  });

  it("saveReviews가 false면 저장하지 않아야 함", async () => {
    const writer = new RecordingWriter();

    await new ReviewCollector(writer, 1).collect(new FakeReviewContainer(makeReviews(3)), {
      ...INPUT,
      saveReviews: false,
    });

    expect(writer.prepared).toBe(0);
    expect(writer.written).toEqual([]);
  });

  it("수집 중 컨테이너 접근이 실패하면 부분 결과를 저장한 뒤 에러를 다시 던져야 함", async () => {
    const writer = new RecordingWriter();

    const error = await collectError(new ReviewCollector(writer, 1), disconnectingContainer());

    expect(error.type).toBe(ScrapeErrorType.CONTAINER_ACCESS_FAILED);
    expect(error.message).toBe("Review container scroll failed: mouse.wheel: Target closed");
    expect(error.partialRecords).toHaveLength(4);
    expect(writer.prepared).toBe(1);
    expect(writer.written).toEqual([makeReviews(4)]);
  });

  it("부분 결과 저장이 실패해도 원래 에러를 던져야 함", async () => {
    const writer = new RecordingWriter(true);

    const error = await collectError(new ReviewCollector(writer, 1), disconnectingContainer());

    expect(error.type).toBe(ScrapeErrorType.CONTAINER_ACCESS_FAILED);
    expect(error.partialRecords).toHaveLength(4);
    expect(writer.written).toEqual([]);
  });

  it("saveReviews가 false면 실패 시에도 저장하지 않아야 함", async () => {
    const writer = new RecordingWriter();

    const error = await collectError(new ReviewCollector(writer, 1), disconnectingContainer(), {
      ...INPUT,
      saveReviews: false,
    });

    expect(error.type).toBe(ScrapeErrorType.CONTAINER_ACCESS_FAILED);
    expect(writer.prepared).toBe(0);
  });
});
