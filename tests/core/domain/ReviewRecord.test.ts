/**
 * ReviewRecord 도메인 모델 Test
 */

import { describe, it, expect } from "@jest/globals";
import {
  boundedPrefix,
  createReviewRecord,
  reviewIdentityKey,
  reviewTextOf,
} from "@/core/domain/ReviewRecord";

describe("ReviewRecord", () => {
  describe("createReviewRecord", () => {
    it("지정하지 않은 필드는 null/빈 배열이어야 함", () => {
      const record = createReviewRecord({
        username: "Jane D",
        ratingScore: 4,
        totalRatingScore: 5,
      });

      expect(record.fullReview).toBeNull();
      expect(record.enLangText).toBeNull();
      expect(record.ownerResponseText).toBeNull();
      expect(record.reviewSite).toBeNull();
      expect(record.reviewImages).toEqual([]);
    });

    it("생성된 레코드는 변경할 수 없어야 함", () => {
      const record = createReviewRecord({
        username: "Jane D",
        ratingScore: 4,
        totalRatingScore: 5,
        reviewImages: ["https://img.test/a.jpg"],
      });

      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.reviewImages)).toBe(true);
    });
  });

  describe("boundedPrefix", () => {
    it("앞 50자만 반환해야 함", () => {
      expect(boundedPrefix("x".repeat(80))).toBe("x".repeat(50));
    });

    it("짧은 텍스트와 null은 그대로/빈 문자열이어야 함", () => {
      expect(boundedPrefix("short")).toBe("short");
      expect(boundedPrefix(null)).toBe("");
    });
  });

  describe("reviewTextOf", () => {
    it("번역본이 있으면 번역본, 없으면 전체 리뷰를 사용해야 함", () => {
      const translated = createReviewRecord({
        username: "a",
        ratingScore: 5,
        totalRatingScore: 5,
        enLangText: "Great",
        fullReview: "(Translated by Google) Great (Original) Genial",
      });
      const fullOnly = createReviewRecord({
        username: "a",
        ratingScore: 5,
        totalRatingScore: 5,
        fullReview: "Only full",
      });

      expect(reviewTextOf(translated)).toBe("Great");
      expect(reviewTextOf(fullOnly)).toBe("Only full");
    });
  });

  describe("reviewIdentityKey", () => {
    const base = {
      username: "Jane D",
      ratingScore: 5,
      totalRatingScore: 5,
      enLangText: "Lovely stay",
    };

    it("상대 날짜가 있으면 변환 날짜가 달라도 같은 키여야 함", () => {
      const first = createReviewRecord({
        ...base,
        date: "a week ago",
        reviewPostDate: "01-01-2024 10:00:00",
      });
      const second = createReviewRecord({
        ...base,
        date: "a week ago",
        reviewPostDate: "01-01-2024 10:00:02",
      });

      expect(reviewIdentityKey(first)).toBe(reviewIdentityKey(second));
    });

    it("상대 날짜가 없으면 변환 날짜를 사용해야 함", () => {
      const first = createReviewRecord({ ...base, reviewPostDate: "01-01-2024 10:00:00" });
      const second = createReviewRecord({ ...base, reviewPostDate: "02-01-2024 10:00:00" });

      expect(reviewIdentityKey(first)).not.toBe(reviewIdentityKey(second));
    });

    it("본문은 앞 50자까지만 키에 반영해야 함", () => {
      const prefix = "y".repeat(50);
      const first = createReviewRecord({ ...base, enLangText: `${prefix} one` });
      const second = createReviewRecord({ ...base, enLangText: `${prefix} two` });

      expect(reviewIdentityKey(first)).toBe(reviewIdentityKey(second));
    });
  });
});
