/**
 * FullScreenReviewParser Test
 */

import { describe, it, expect } from "@jest/globals";
import { SiteConfigLoader } from "@/config/SiteConfigLoader";
import { createReviewRecord } from "@/core/domain/ReviewRecord";
import type { FullScreenFields } from "@/core/domain/SiteConfig";
import { FullScreenReviewParser } from "@/extractors/google/FullScreenReviewParser";
import { FakeElementScope, FakeNode } from "../../helpers/FakeElementScope";

const NOW = new Date(2023, 9, 20, 15, 27, 33);

const fields: FullScreenFields = {
  username: [{ selector: "name", all: false }],
  user_profile: [{ selector: "name", attribute: "href", all: false }],
  rating: [
    { selector: "rating5", all: false },
    { selector: "rating10", all: false },
  ],
  date: [{ selector: "date", all: false }],
  stay_type: [{ selector: "stay", all: false }],
  review_text: [{ selector: "part", all: true }],
  images: [{ selector: "img", attribute: "src", all: true }],
};

const parser = new FullScreenReviewParser(fields, () => NOW);

function scopeWith(overrides: Record<string, FakeNode | FakeNode[]> = {}): FakeElementScope {
  return new FakeElementScope({
    name: { text: "Jane D", attributes: { href: "https://profile.example.test/jane" } },
    rating5: { text: "4/5" },
    date: { text: "3 weeks ago on Google" },
    stay: { text: "Vacation ❘ Couple" },
    part: [{ text: "Great breakfast." }, { text: "Rooms" }, { text: "4.0" }],
    ...overrides,
  });
}

describe("FullScreenReviewParser", () => {
  it("리뷰 요소를 ReviewRecord로 변환해야 함", async () => {
    const record = await parser.parse(
      scopeWith({
        part: [
          { text: "Great breakfast." },
          { text: "Rooms" },
          { text: "4.0" },
          { text: "Response from the owner" },
          { text: "a week ago\nThank you!" },
        ],
        img: [{ attributes: { src: "https://lh5.example.test/p/AF1Q=w150-h150-k-no-p" } }],
      }),
    );

    expect(record).toEqual(
      createReviewRecord({
        username: "Jane D",
        userProfile: "https://profile.example.test/jane",
        ratingScore: 4,
        totalRatingScore: 5,
        date: "3 weeks ago",
        reviewPostDate: "09-29-2023 15:27:33",
        reviewSite: "Google",
        stayType: "Vacation ❘ Couple",
        enLangText: "Great breakfast.",
        ratingTags: "Rooms 4.0,",
        ownerResponseText: "Thank you!",
        ownerResponseTime: "10-13-2023 15:27:33",
        reviewImages: ["https://lh5.example.test/p/AF1Q=w800-h800"],
      }),
    );
  });

  it("/5 평점이 없으면 /10 평점을 사용해야 함", async () => {
    const record = await parser.parse(
      new FakeElementScope({
        name: { text: "Sam K" },
        rating10: { text: "8/10" },
        date: { text: "2 months ago on Agoda" },
        part: { text: "Good value" },
      }),
    );

    expect(record?.ratingScore).toBe(8);
    expect(record?.totalRatingScore).toBe(10);
    expect(record?.reviewSite).toBe("Agoda");
    expect(record?.userProfile).toBeNull();
    expect(record?.reviewImages).toEqual([]);
  });

  it("지연 로딩 이미지가 섞여 있어도 모든 이미지를 수집해야 함", async () => {
    const siteFields = SiteConfigLoader.getInstance().loadSite("google").full_screen.fields;
    const carouselParser = new FullScreenReviewParser(
      { ...fields, images: siteFields.images },
      () => NOW,
    );
    const imageSelector = siteFields.images[0].selector;

    const record = await carouselParser.parse(
      scopeWith({
        [imageSelector]: [
          { attributes: { src: "https://img.example.test/a=w150-h150-k-no-p" } },
          { attributes: { "data-src": "https://img.example.test/b=w150-h150-k-no-p" } },
        ],
      }),
    );

    expect(record?.reviewImages).toEqual([
      "https://img.example.test/a=w800-h800",
      "https://img.example.test/b=w800-h800",
    ]);
  });

  it("작성자나 평점이 없으면 null을 반환해야 함", async () => {
    expect(await parser.parse(scopeWith({ name: [] }))).toBeNull();
    expect(await parser.parse(scopeWith({ rating5: { text: "no rating" } }))).toBeNull();
  });
});
