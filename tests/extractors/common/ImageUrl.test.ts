/**
 * ImageUrl Test
 */

import { describe, it, expect } from "@jest/globals";
import { ImageUrl } from "@/extractors/common/ImageUrl";

describe("ImageUrl", () => {
  describe("resize", () => {
    it("전체 화면 이미지 크기 토큰을 800x800으로 바꿔야 함", () => {
      expect(ImageUrl.resize("https://lh5.example.test/p/AF1Q=w150-h150-k-no-p")).toBe(
        "https://lh5.example.test/p/AF1Q=w800-h800",
      );
    });

    it("다이얼로그 이미지 크기 토큰을 800x800으로 바꿔야 함", () => {
      expect(ImageUrl.resize("https://lh5.example.test/p/AF1Q=w100-h100-p-n-k-no")).toBe(
        "https://lh5.example.test/p/AF1Q=w800-h800",
      );
    });

    it("토큰이 없으면 그대로 반환해야 함", () => {
      expect(ImageUrl.resize("https://img.example.test/photo.jpg")).toBe(
        "https://img.example.test/photo.jpg",
      );
    });
  });

  describe("fromBackgroundStyle", () => {
    it("따옴표 유무와 관계없이 URL을 추출해야 함", () => {
      expect(
        ImageUrl.fromBackgroundStyle('background-image: url("https://img.example.test/a.jpg");'),
      ).toBe("https://img.example.test/a.jpg");
      expect(ImageUrl.fromBackgroundStyle("background-image:url(https://img.example.test/b.jpg)")).toBe(
        "https://img.example.test/b.jpg",
      );
    });

    it("URL이 없으면 null을 반환해야 함", () => {
      expect(ImageUrl.fromBackgroundStyle("width: 100px")).toBeNull();
      expect(ImageUrl.fromBackgroundStyle(null)).toBeNull();
    });
  });
});
