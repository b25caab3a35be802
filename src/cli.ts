#!/usr/bin/env node
/**
 * 리뷰 수집 CLI
 *
 * 사용법:
 *   review-scraper <place_name> [sort_by] [n_reviews] [options]
 *
 * 예시:
 *   review-scraper "Harbor View Hotel"
 *   review-scraper "Harbor View Hotel" lowest_score 50
 *   review-scraper "Harbor View Hotel" --url "https://www.google.com/travel/hotels/entity/..."
 *   review-scraper "Harbor View Hotel" most_recent -1 --stop-username "Jane D"
 */

import "dotenv/config";
import { flushLogger, logger } from "@/config/logger";
import { ScrapeError } from "@/core/interfaces/ScrapeErrorType";
import { scrapeReviews } from "@/index";
import { parseCliArgs, usage } from "@/utils/CliArgs";

/**
 * 메인 함수
 */
async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === "help") {
    console.log(usage());
    return 0;
  }
  if (command.kind === "error") {
    console.error(`❌ ${command.message}\n`);
    console.error(usage());
    return 1;
  }

  const startTime = Date.now();
  console.log(`🔍 리뷰 수집 시작: "${command.params.placeName}"`);

  const result = await scrapeReviews(command.params, { configPath: command.configPath });
  const rating = result.overallRating;

  console.log(`✅ 수집 완료 (${Date.now() - startTime}ms)`);
  console.log(`   평점: ${rating.rating ?? "N/A"} (리뷰 ${rating.reviewCount ?? "N/A"}개)`);
  console.log(`   수집 리뷰: ${result.reviews.length}개`);
  console.log(`   종료 사유: ${result.reason}`);
  return 0;
}

function reportFailure(error: unknown): number {
  if (error instanceof ScrapeError) {
    logger.error(error.toLogObject(), "CLI 실행 실패");
    console.error(`❌ [${error.type}] ${error.message}`);
    if (error.partialRecords.length > 0) {
      console.error(`   중단 전 수집 리뷰: ${error.partialRecords.length}개`);
    }
  } else {
    logger.error({ error }, "CLI 예기치 않은 오류");
    console.error("❌ 예기치 않은 오류:", error);
  }
  return 1;
}

if (require.main === module) {
  // 로그 파일 flush 후 종료 (rotating-file-stream 버퍼 유실 방지)
  void main()
    .catch(reportFailure)
    .then(async (code) => {
      await flushLogger();
      process.exit(code);
    });
}
