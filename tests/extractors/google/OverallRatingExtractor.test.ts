/**
 * OverallRatingExtractor Test
 *
 * sites/google.yaml 셀렉터를 그대로 사용
 */

import { describe, it, expect } from "@jest/globals";
import { SiteConfigLoader } from "@/config/SiteConfigLoader";
import { OverallRatingExtractor } from "@/extractors/google/OverallRatingExtractor";
import { FakeElementScope } from "../../helpers/FakeElementScope";

const siteConfig = SiteConfigLoader.getInstance().loadSite("google");
const extractor = new OverallRatingExtractor(siteConfig);

function ariaLabel(value: string) {
  return { attributes: { "aria-label": value } };
}

describe("OverallRatingExtractor", () => {
  it("전체 화면 모드는 평점, 리뷰 수, 별점별 비율을 읽어야 함", async () => {
    const summary = siteConfig.full_screen.summary;
    const starSelector = (star: number) => summary.star_label.replace("{star}", String(star));
    const page = new FakeElementScope({
      [summary.rating_label]: ariaLabel("4.2 out of 5 stars from 1,024 reviews"),
      [starSelector(5)]: ariaLabel("5-star reviews 61 percent."),
      [starSelector(4)]: ariaLabel("4-star reviews 22 percent."),
      [starSelector(3)]: ariaLabel("3-star reviews 9 percent."),
      [starSelector(1)]: ariaLabel("1-star reviews 5 percent."),
    });

    expect(await extractor.extract(page, "full_screen", "Harbor View Hotel")).toEqual({
      entityName: "Harbor View Hotel",
      rating: 4.2,
      reviewCount: 1024,
      starDistribution: { 5: "61", 4: "22", 3: "9", 2: null, 1: "5" },
    });
  });

  it("다이얼로그 모드는 평점과 리뷰 수 텍스트를 읽어야 함", async () => {
    const summary = siteConfig.dialog.summary;
    const page = new FakeElementScope({
      [summary.rating_label]: ariaLabel("Rated 4.1 out of 5,"),
      [summary.review_count_text]: { text: " 50 reviews on Google " },
    });

    expect(await extractor.extract(page, "dialog", "Harbor View Hotel")).toEqual({
      entityName: "Harbor View Hotel",
      rating: 4.1,
      reviewCount: 50,
    });
  });

  it("요약 영역이 없으면 값은 null이어야 함", async () => {
    const overall = await extractor.extract(new FakeElementScope({}), "dialog", "Harbor View Hotel");

    expect(overall).toEqual({ entityName: "Harbor View Hotel", rating: null, reviewCount: null });
  });
});
