/**
 * StopCriterion Test
 */

import { describe, it, expect } from "@jest/globals";
import {
  StopCriterionSchema,
  buildStopCriterion,
  matchesStopCriterion,
} from "@/core/domain/StopCriterion";
import { createReviewRecord } from "@/core/domain/ReviewRecord";

const record = createReviewRecord({
  username: "Jane D",
  ratingScore: 5,
  totalRatingScore: 5,
  enLangText: "Lovely stay, the breakfast was great and the staff were kind",
});

describe("StopCriterion", () => {
  describe("matchesStopCriterion", () => {
    it("작성자만 지정하면 작성자만 비교해야 함", () => {
      expect(matchesStopCriterion(record, { username: "Jane D" })).toBe(true);
      expect(matchesStopCriterion(record, { username: "John D" })).toBe(false);
    });

    it("대소문자를 구분해야 함", () => {
      expect(matchesStopCriterion(record, { username: "jane d" })).toBe(false);
    });

    it("리뷰 텍스트는 앞 50자가 같아야 일치해야 함", () => {
      const pattern = "Lovely stay, the breakfast was great and the staff w";
      expect(matchesStopCriterion(record, { reviewText: pattern })).toBe(true);
      expect(matchesStopCriterion(record, { reviewText: "Lovely stay" })).toBe(false);
    });

    it("두 필드를 모두 지정하면 모두 일치해야 함", () => {
      const text = record.enLangText ?? "";
      expect(matchesStopCriterion(record, { username: "Jane D", reviewText: text })).toBe(true);
      expect(matchesStopCriterion(record, { username: "Someone", reviewText: text })).toBe(false);
    });

    it("빈 조건은 일치하지 않아야 함", () => {
      expect(matchesStopCriterion(record, {})).toBe(false);
    });
  });

  describe("StopCriterionSchema", () => {
    it("필드가 하나도 없으면 거부해야 함", () => {
      expect(StopCriterionSchema.safeParse({}).success).toBe(false);
      expect(StopCriterionSchema.safeParse({ username: "" }).success).toBe(false);
    });

    it("필드가 하나라도 있으면 허용해야 함", () => {
      expect(StopCriterionSchema.safeParse({ reviewText: "Lovely" }).success).toBe(true);
    });
  });

  describe("buildStopCriterion", () => {
    it("값이 모두 비어 있으면 undefined를 반환해야 함", () => {
      expect(buildStopCriterion(undefined, null)).toBeUndefined();
      expect(buildStopCriterion("", "")).toBeUndefined();
    });

    it("지정된 값만 포함해야 함", () => {
      expect(buildStopCriterion("Jane D", undefined)).toEqual({ username: "Jane D" });
      expect(buildStopCriterion(null, "Lovely")).toEqual({ reviewText: "Lovely" });
    });
  });
});
