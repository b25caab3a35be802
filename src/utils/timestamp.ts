/**
 * 타임스탬프 유틸리티
 */

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+09:00)
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  return (
    `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}` +
    `T${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}` +
    `.${pad(now.getMilliseconds(), 3)}` +
    `${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`
  );
}

/**
 * YYYY-MM-DD 형식의 날짜 문자열 반환 (로컬 타임존 기준)
 */
export function getLocalDateString(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/**
 * 파일/디렉토리명용 실행 타임스탬프 (YYYY-MM-DD_HH-mm-ss)
 */
export function getRunStamp(now: Date = new Date()): string {
  return `${getLocalDateString(now)}_${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
}

/**
 * 리뷰 게시일 출력 포맷 (MM-DD-YYYY HH:mm:ss)
 */
export function formatReviewTimestamp(date: Date): string {
  return (
    `${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
