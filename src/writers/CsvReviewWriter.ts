/**
 * CsvReviewWriter - 리뷰/평점 CSV 저장
 *
 * 경로: {outputDir}/{entityName}_{YYYY-MM-DD_HH-mm-ss}/
 * - metadata.csv: 전체 평점 (헤더 + 1행, 덮어쓰기)
 * - reviews_{sortBy}.csv: 리뷰 (append, 파일이 없을 때만 헤더 작성)
 *
 * 중단 시에도 이미 수집된 결과 보존 (부분 결과 flush)
 */

import * as fs from "fs/promises";
import * as path from "path";
import { stringify } from "csv-stringify/sync";
import { logger } from "@/config/logger";
import { OverallRating, STAR_LEVELS } from "@/core/domain/OverallRating";
import type { ReviewRecord } from "@/core/domain/ReviewRecord";
import type { IReviewWriter } from "@/core/interfaces/IReviewWriter";
import { ScrapeError, ScrapeErrorType } from "@/core/interfaces/ScrapeErrorType";
import { getRunStamp } from "@/utils/timestamp";

/** reviews_{sortBy}.csv 컬럼 순서 */
export const REVIEW_COLUMNS = [
  "full_review",
  "rating_tags",
  "en_lang_text",
  "other_lang_text",
  "owner_resp_text",
  "owner_resp_time",
  "username",
  "user_profile",
  "date",
  "review_post_date",
  "review_site",
  "rating_score",
  "total_rating_score",
  "stay_type",
  "review_images",
] as const;

/** metadata.csv 컬럼 순서 */
export const METADATA_COLUMNS = [
  "rating",
  "no_of_reviews",
  ...STAR_LEVELS.map((star) => `${star}-star` as const),
  "entity_name",
] as const;

type CsvCell = string | number | null;
type ReviewRow = Record<(typeof REVIEW_COLUMNS)[number], CsvCell>;

export interface CsvReviewWriterOptions {
  outputDir: string;
  entityName: string;
  sortBy: string;
  /** 실행 시각 (디렉토리명) */
  startedAt?: Date;
}

export function toReviewRow(record: ReviewRecord): ReviewRow {
  return {
    full_review: record.fullReview,
    rating_tags: record.ratingTags,
    en_lang_text: record.enLangText,
    other_lang_text: record.otherLangText,
    owner_resp_text: record.ownerResponseText,
    owner_resp_time: record.ownerResponseTime,
    username: record.username,
    user_profile: record.userProfile,
    date: record.date,
    review_post_date: record.reviewPostDate,
    review_site: record.reviewSite,
    rating_score: record.ratingScore,
    total_rating_score: record.totalRatingScore,
    stay_type: record.stayType,
    review_images: record.reviewImages.length > 0 ? record.reviewImages.join(", ") : null,
  };
}

export function toMetadataRow(rating: OverallRating): Record<string, CsvCell> {
  const row: Record<string, CsvCell> = {
    rating: rating.rating,
    no_of_reviews: rating.reviewCount,
  };
  for (const star of STAR_LEVELS) {
    row[`${star}-star`] = rating.starDistribution?.[star] ?? null;
  }
  row.entity_name = rating.entityName;
  return row;
}

/**
 * 디렉토리명에 쓸 수 없는 문자 치환
 */
function toDirectoryName(name: string): string {
  return name.replace(/[\\/:*?"<>|]+/g, "_").trim();
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class CsvReviewWriter implements IReviewWriter {
  readonly directory: string;
  readonly metadataPath: string;
  readonly reviewsPath: string;

  constructor(options: CsvReviewWriterOptions) {
    this.directory = path.join(
      path.resolve(options.outputDir),
      `${toDirectoryName(options.entityName)}_${getRunStamp(options.startedAt)}`,
    );
    this.metadataPath = path.join(this.directory, "metadata.csv");
    this.reviewsPath = path.join(this.directory, `reviews_${options.sortBy}.csv`);
  }

  async prepare(): Promise<void> {
    await this.guard("prepare", () => fs.mkdir(this.directory, { recursive: true }));
  }

  async writeMetadata(rating: OverallRating): Promise<void> {
    const csv = stringify([toMetadataRow(rating)], {
      header: true,
      columns: [...METADATA_COLUMNS],
    });
    await this.guard("metadata", () => fs.writeFile(this.metadataPath, csv, "utf8"));
    logger.info({ filePath: this.metadataPath }, "metadata.csv 저장 완료");
  }

  async writeReviews(records: readonly ReviewRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await this.guard("reviews", async () => {
      const writeHeader = !(await fileExists(this.reviewsPath));
      const csv = stringify(records.map(toReviewRow), {
        header: writeHeader,
        columns: [...REVIEW_COLUMNS],
      });
      await fs.appendFile(this.reviewsPath, csv, "utf8");
    });
    logger.info(
      { filePath: this.reviewsPath, count: records.length },
      "리뷰 CSV 저장 완료",
    );
  }

  private async guard(operation: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
    } catch (error) {
      throw new ScrapeError(
        ScrapeErrorType.OUTPUT_FAILED,
        `CSV ${operation} write failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }
}
