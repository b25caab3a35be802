/**
 * 리뷰 이미지 URL 처리
 */

import { SCRAPER_CONFIG } from "@/config/constants";

/** Google 이미지 크기 토큰 (전체 화면 / 다이얼로그) */
const SIZE_TOKEN_PATTERNS = [/w\d+-h\d+-k-no-p/g, /w\d+-h\d+-p-n-k-no/g];

const BACKGROUND_URL_PATTERN = /url\((["']?)(.*?)\1\)/;

export class ImageUrl {
  /**
   * 크기 토큰을 800x800으로 치환 (토큰이 없으면 그대로)
   */
  static resize(url: string): string {
    return SIZE_TOKEN_PATTERNS.reduce(
      (result, pattern) => result.replace(pattern, SCRAPER_CONFIG.IMAGE_SIZE_TOKEN),
      url,
    );
  }

  /**
   * style 속성의 background-image URL 추출
   * 예: `background-image: url("https://...")` → `https://...`
   */
  static fromBackgroundStyle(style: string | null | undefined): string | null {
    if (!style) {
      return null;
    }
    const match = BACKGROUND_URL_PATTERN.exec(style);
    const url = match?.[2]?.trim();
    return url ? url : null;
  }
}
