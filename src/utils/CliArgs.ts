/**
 * CLI 인자 파싱
 *
 * review-scraper <place_name> [sort_by] [n_reviews] [options]
 */

import { APP_METADATA, SCRAPER_CONFIG } from "@/config/constants";
import { SORT_OPTIONS, ScrapeInputParams, SortBySchema } from "@/core/domain/ScrapeInput";
import { buildStopCriterion } from "@/core/domain/StopCriterion";

export type CliCommand =
  | { kind: "help" }
  | { kind: "error"; message: string }
  | { kind: "run"; params: ScrapeInputParams; configPath: string };

const VALUE_OPTIONS = ["--url", "--stop-username", "--stop-review", "--config"] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(arg: string): arg is ValueOption {
  return VALUE_OPTIONS.some((option) => option === arg);
}

export function usage(): string {
  return [
    `${APP_METADATA.NAME} v${APP_METADATA.VERSION}`,
    "",
    "사용법:",
    `  ${APP_METADATA.CLI_NAME} <place_name> [sort_by] [n_reviews] [options]`,
    "",
    "인자:",
    "  place_name               검색할 장소명 (출력 디렉토리명)",
    `  sort_by                  ${SORT_OPTIONS.join(" | ")} (기본: most_recent)`,
    "  n_reviews                수집할 리뷰 수, -1 = 전체 (기본: -1)",
    "",
    "옵션:",
    "  --url <page_url>         검색 대신 장소 페이지 URL로 이동",
    "  --stop-username <name>   이 작성자의 리뷰를 만나면 중단",
    "  --stop-review <text>     리뷰 앞 50자(짧으면 전체)와 정확히 같으면 중단",
    "  --no-save-reviews        리뷰 CSV 저장 안 함",
    "  --no-save-metadata       metadata.csv 저장 안 함",
    `  --config <path>          설정 파일 (기본: ${SCRAPER_CONFIG.DEFAULT_CONFIG_PATH})`,
    "  -h, --help               도움말",
  ].join("\n");
}

/**
 * CLI 인자 파싱
 */
export function parseCliArgs(args: readonly string[]): CliCommand {
  const positional: string[] = [];
  const values: Partial<Record<ValueOption, string>> = {};
  let saveReviews = true;
  let saveMetadata = true;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }
    if (arg === "--no-save-reviews") {
      saveReviews = false;
      continue;
    }
    if (arg === "--no-save-metadata") {
      saveMetadata = false;
      continue;
    }
    if (isValueOption(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        return { kind: "error", message: `${arg} 옵션에 값이 필요합니다` };
      }
      values[arg] = value;
      i++;
      continue;
    }
    // 음수(-1)는 위치 인자
    if (arg.startsWith("-") && !/^-\d+$/.test(arg)) {
      return { kind: "error", message: `알 수 없는 옵션: ${arg}` };
    }
    positional.push(arg);
  }

  if (positional.length === 0) {
    return { kind: "error", message: "place_name 인자가 필요합니다" };
  }
  if (positional.length > 3) {
    return { kind: "error", message: `인자가 너무 많습니다: ${positional.slice(3).join(" ")}` };
  }

  const [placeName, sortByArg, countArg] = positional;

  const sortBy = SortBySchema.safeParse(sortByArg ?? "most_recent");
  if (!sortBy.success) {
    return {
      kind: "error",
      message: `지원하지 않는 정렬 옵션: ${sortByArg} (${SORT_OPTIONS.join(", ")})`,
    };
  }

  let maxReviews = -1;
  if (countArg !== undefined) {
    if (!/^-?\d+$/.test(countArg)) {
      return { kind: "error", message: `n_reviews는 정수여야 합니다: ${countArg}` };
    }
    maxReviews = Number.parseInt(countArg, 10);
  }

  const stopCriteria = buildStopCriterion(values["--stop-username"], values["--stop-review"]);

  return {
    kind: "run",
    configPath: values["--config"] ?? SCRAPER_CONFIG.DEFAULT_CONFIG_PATH,
    params: {
      placeName,
      sortBy: sortBy.data,
      maxReviews,
      saveReviews,
      saveMetadata,
      pageUrl: values["--url"],
      stopCriteria,
    },
  };
}
