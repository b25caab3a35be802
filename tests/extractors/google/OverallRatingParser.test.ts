/**
 * OverallRatingParser Test
 */

import { describe, it, expect } from "@jest/globals";
import { OverallRatingParser } from "@/extractors/google/OverallRatingParser";

describe("OverallRatingParser", () => {
  it("평점 라벨에서 평점을 추출해야 함", () => {
    expect(OverallRatingParser.parseRating("3.6 out of 5 stars from 206 reviews")).toBe(3.6);
    expect(OverallRatingParser.parseRating("Rated 4.1 out of 5,")).toBe(4.1);
    expect(OverallRatingParser.parseRating("No rating")).toBeNull();
    expect(OverallRatingParser.parseRating(null)).toBeNull();
  });

  it("두 가지 형식의 리뷰 수를 추출해야 함", () => {
    expect(OverallRatingParser.parseReviewCount("3.6 out of 5 stars from 1,206 reviews")).toBe(
      1206,
    );
    expect(OverallRatingParser.parseReviewCount("50 reviews on Google")).toBe(50);
    expect(OverallRatingParser.parseReviewCount("1 review on Google")).toBe(1);
    expect(OverallRatingParser.parseReviewCount("reviews on Google")).toBeNull();
  });

  it("별점별 비율을 문자열로 추출해야 함", () => {
    expect(OverallRatingParser.parseStarShare("5-star reviews 72 percent.")).toBe("72");
    expect(OverallRatingParser.parseStarShare("1-star reviews 3.5 percent.")).toBe("3.5");
    expect(OverallRatingParser.parseStarShare("5 stars")).toBeNull();
  });
});
