/**
 * 테스트용 IReviewContainer
 *
 * 스크롤 횟수에 따라 렌더링 요소 수가 늘어나는 목록을 흉내
 * frames 지정 시: 스크롤 횟수별로 렌더링된 요소 목록 자체를 교체 (가상화 목록)
 */

import { ReviewRecord, createReviewRecord } from "@/core/domain/ReviewRecord";
import type { IReviewContainer } from "@/core/interfaces/IReviewContainer";

/** 요소별 파싱 결과: 레코드, null (필수 필드 없음), Error (파싱 중 예외) */
export type FakeElement = ReviewRecord | null | Error;

export interface FakeContainerOptions {
  /** 스크롤 횟수 → 렌더링된 요소 수 (기본: 전부) */
  reveal?: (scrolls: number) => number;
  /** n번째 countRendered 호출에서 실패 */
  failCountOnCall?: number;
  /** n번째 scrollForMore 호출에서 실패 */
  failScrollOnCall?: number;
  /** 요소 하나당 스크롤 높이 */
  extentPerElement?: number;
  /** 스크롤 횟수 → 렌더링된 요소 목록 (마지막 frame 이후는 유지) */
  frames?: FakeElement[][];
}

export class FakeReviewContainer implements IReviewContainer {
  scrolls = 0;
  countCalls = 0;
  readonly parsedIndices: number[] = [];

  constructor(
    private readonly elements: FakeElement[],
    private readonly options: FakeContainerOptions = {},
  ) {}

  async countRendered(): Promise<number> {
    this.countCalls++;
    if (this.countCalls === this.options.failCountOnCall) {
      throw new Error("Target page, context or browser has been closed");
    }
    return this.rendered();
  }

  async parseAt(index: number): Promise<ReviewRecord | null> {
    this.parsedIndices.push(index);
    const element = this.currentElements()[index];
    if (element instanceof Error) {
      throw element;
    }
    return element ?? null;
  }

  async scrollForMore(): Promise<void> {
    if (this.scrolls + 1 === this.options.failScrollOnCall) {
      throw new Error("mouse.wheel: Target closed");
    }
    this.scrolls++;
  }

  async scrollExtent(): Promise<number> {
    return this.rendered() * (this.options.extentPerElement ?? 100);
  }

  private rendered(): number {
    const elements = this.currentElements();
    const reveal = this.options.reveal ?? (() => elements.length);
    return Math.min(reveal(this.scrolls), elements.length);
  }

  private currentElements(): FakeElement[] {
    const frames = this.options.frames;
    if (!frames || frames.length === 0) {
      return this.elements;
    }
    return frames[Math.min(this.scrolls, frames.length - 1)];
  }
}

/**
 * 테스트 리뷰 생성 (user-{n}, "review text {n}")
 */
export function makeReview(n: number, overrides: Partial<ReviewRecord> = {}): ReviewRecord {
  return createReviewRecord({
    username: `user-${n}`,
    ratingScore: 5,
    totalRatingScore: 5,
    enLangText: `review text ${n}`,
    date: "a week ago",
    ...overrides,
  });
}

export function makeReviews(count: number): ReviewRecord[] {
  return Array.from({ length: count }, (_, i) => makeReview(i + 1));
}
