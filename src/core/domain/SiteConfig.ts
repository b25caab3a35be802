/**
 * SiteConfig - 리뷰 사이트 셀렉터 설정 (sites/*.yaml)
 *
 * 셀렉터 변경 시 코드 수정 없이 YAML만 갱신
 */

import { z } from "zod";

/**
 * 셀렉터 규칙
 * - attribute 지정 시 속성값, 아니면 textContent
 * - attribute 목록: 요소마다 앞에서부터 값이 있는 속성 사용 (예: [src, data-src])
 * - all: 일치하는 모든 요소의 값 (목록)
 */
export const SelectorRuleSchema = z.object({
  selector: z.string().min(1),
  attribute: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
  all: z.boolean().default(false),
});

export type SelectorRule = z.infer<typeof SelectorRuleSchema>;

/**
 * YAML 축약형 지원: 문자열 하나 = 텍스트 셀렉터
 */
const SelectorRuleEntrySchema = z.union([
  z
    .string()
    .min(1)
    .transform((selector): SelectorRule => ({ selector, all: false })),
  SelectorRuleSchema,
]);

/** 우선순위 순 셀렉터 목록 */
export const SelectorChainSchema = z.array(SelectorRuleEntrySchema).min(1);

/** 정렬 옵션별 화면 라벨 */
const SortLabelsSchema = z.object({
  most_helpful: z.string().min(1),
  most_recent: z.string().min(1),
  highest_score: z.string().min(1),
  lowest_score: z.string().min(1),
});

const SortConfigSchema = z.object({
  trigger: z.string().min(1),
  /** {label} 자리에 정렬 라벨 치환 */
  option: z.string().min(1),
  labels: SortLabelsSchema,
});

const FullScreenFieldsSchema = z.object({
  username: SelectorChainSchema,
  user_profile: SelectorChainSchema,
  rating: SelectorChainSchema,
  date: SelectorChainSchema,
  stay_type: SelectorChainSchema,
  review_text: SelectorChainSchema,
  images: SelectorChainSchema,
});

const DialogFieldsSchema = z.object({
  username: SelectorChainSchema,
  user_profile: SelectorChainSchema,
  rating: SelectorChainSchema,
  date: SelectorChainSchema,
  other_site_text: SelectorChainSchema,
  images: SelectorChainSchema,
});

export const SiteConfigSchema = z.object({
  site: z.string().min(1),
  name: z.string().min(1),
  search: z.object({
    url: z.string().url(),
    search_box: z.string().min(1),
    blocked_marker: z.string().min(1),
    english_link: z.string().min(1),
    full_screen_button: z.string().min(1),
    dialog_button: z.string().min(1),
  }),
  page_url: z.object({
    reviews_tab: z.string().min(1),
  }),
  full_screen: z.object({
    summary: z.object({
      rating_label: z.string().min(1),
      /** {star} 자리에 별점 (5~1) 치환 */
      star_label: z.string().min(1),
    }),
    source_filter: z.object({
      listbox: z.string().min(1),
      option: z.string().min(1),
    }),
    sort: SortConfigSchema,
    container: z.string().min(1),
    item: z.string().min(1),
    fields: FullScreenFieldsSchema,
  }),
  dialog: z.object({
    summary: z.object({
      rating_label: z.string().min(1),
      review_count_text: z.string().min(1),
    }),
    sort: SortConfigSchema,
    container: z.string().min(1),
    item: z.string().min(1),
    google_marker: z.string().min(1),
    review_sections: z.string().min(1),
    original_sections: z.string().min(1),
    photo_carousel: z.string().min(1),
    owner_response: z.object({
      with_photos: z.string().min(1),
      without_photos: z.string().min(1),
    }),
    fields: DialogFieldsSchema,
  }),
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type SortConfig = z.infer<typeof SortConfigSchema>;
export type FullScreenConfig = SiteConfig["full_screen"];
export type DialogConfig = SiteConfig["dialog"];
export type FullScreenFields = z.infer<typeof FullScreenFieldsSchema>;
export type DialogFields = z.infer<typeof DialogFieldsSchema>;

/** 리뷰 목록 표시 방식 */
export type ReviewViewMode = "full_screen" | "dialog";
