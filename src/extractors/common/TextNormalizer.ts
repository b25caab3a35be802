/**
 * 텍스트 정규화
 */
export class TextNormalizer {
  /**
   * 연속 공백/줄바꿈을 공백 하나로, 앞뒤 공백 제거
   * @returns 빈 문자열이면 null
   */
  static clean(text: string | null | undefined): string | null {
    if (!text) {
      return null;
    }
    const cleaned = text.replace(/\s+/g, " ").trim();
    return cleaned.length > 0 ? cleaned : null;
  }
}
