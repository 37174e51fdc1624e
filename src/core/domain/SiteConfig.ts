/**
 * SiteConfig - サイト YAML 設定スキーマ
 *
 * 一覧カード・各項目のセレクタは優先順のリストで持つ
 * (サイトのマークアップが安定しないため)
 */

import { z } from "zod";

const SelectorListSchema = z.array(z.string().min(1)).min(1);

export const HttpSettingsSchema = z.object({
  userAgent: z.string().min(1),
  headers: z.record(z.string()).default({}),
  /** ミリ秒 */
  timeout: z.number().int().positive().default(20000),
});

export type HttpSettings = z.infer<typeof HttpSettingsSchema>;

export const SearchSettingsSchema = z.object({
  baseUrl: z.string().url(),
  /** 県名を渡すクエリパラメータ名 */
  prefectureParam: z.string().default("pref"),
  /** ページ番号を渡すクエリパラメータ名 */
  pageParam: z.string().default("page"),
  /** 固定で付与する追加クエリ */
  extraParams: z.record(z.string()).default({}),
});

export type SearchSettings = z.infer<typeof SearchSettingsSchema>;

export const ListingSelectorsSchema = z.object({
  card: SelectorListSchema,
  officeName: SelectorListSchema,
  representativeName: SelectorListSchema,
  phone: SelectorListSchema,
  address: SelectorListSchema,
  registrationEra: SelectorListSchema,
  detailLink: SelectorListSchema.default(["a[href]"]),
});

export type ListingSelectors = z.infer<typeof ListingSelectorsSchema>;

export const SnapshotSettingsSchema = z.object({
  url: z.string().url(),
  htmlFileName: z.string().default("playwright_first_page.html"),
  screenshotFileName: z.string().default("playwright_first_page.png"),
  timeout: z.number().int().positive().default(60000),
});

export type SnapshotSettings = z.infer<typeof SnapshotSettingsSchema>;

export const SiteConfigSchema = z.object({
  site: z.string().min(1),
  description: z.string().optional(),
  search: SearchSettingsSchema,
  http: HttpSettingsSchema,
  selectors: ListingSelectorsSchema,
  snapshot: SnapshotSettingsSchema,
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
