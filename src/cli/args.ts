/**
 * CLI 引数パース
 *
 * node:util の parseArgs で分解し、zod で検証する
 */

import { parseArgs } from "util";
import { z } from "zod";
import { SCRAPER_DEFAULTS, SHEET_NAME_MAX_LENGTH, SHEET_NAMES } from "@/config/constants";

export const SCRAPE_USAGE = `使い方:
  npm run scrape -- --pref <都道府県名> --out <出力.xlsx> [--delay <秒>] [--max-pages <数>] [--config <yaml>] [--debug]

例:
  npm run scrape -- --pref 静岡 --out 静岡_税理士リスト.xlsx --delay 1.2`;

export const SNAPSHOT_USAGE = `使い方:
  npm run snapshot -- [--out-dir <ディレクトリ>] [--config <yaml>]`;

/** Excel のシート名に使えない文字 */
const SHEET_NAME_FORBIDDEN = /[\\/?*[\]:]/;

const ScrapeArgsSchema = z.object({
  pref: z
    .string({ required_error: "--pref は必須です" })
    .trim()
    .min(1, "--pref は必須です")
    .refine((v) => !SHEET_NAME_FORBIDDEN.test(v), "--pref にシート名で使えない文字が含まれています")
    .refine(
      (v) => !v.startsWith("'") && !v.endsWith("'"),
      "--pref の先頭・末尾に ' は使えません",
    )
    .refine(
      (v) =>
        Math.max(SHEET_NAMES.withoutEmail(v).length, SHEET_NAMES.withEmail(v).length) <=
        SHEET_NAME_MAX_LENGTH,
      `--pref が長すぎます (シート名は ${SHEET_NAME_MAX_LENGTH} 文字まで)`,
    ),
  out: z
    .string({ required_error: "--out は必須です" })
    .trim()
    .min(1, "--out は必須です"),
  delay: z.coerce
    .number({ invalid_type_error: "--delay は数値で指定してください" })
    .nonnegative("--delay は 0 以上で指定してください")
    .default(SCRAPER_DEFAULTS.DELAY_SEC),
  maxPages: z.coerce
    .number()
    .int("--max-pages は整数で指定してください")
    .positive("--max-pages は 1 以上で指定してください")
    .optional(),
  config: z.string().optional(),
  debug: z.boolean().default(false),
});

export type ScrapeArgs = z.infer<typeof ScrapeArgsSchema>;

export interface SnapshotArgs {
  outDir?: string;
  config?: string;
}

/**
 * 引数エラー (usage を表示して終了する)
 */
export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgumentError";
  }
}

export function parseScrapeArgs(argv: string[]): ScrapeArgs {
  const { values } = safeParseArgs(argv, {
    pref: { type: "string" },
    out: { type: "string" },
    delay: { type: "string" },
    "max-pages": { type: "string" },
    config: { type: "string" },
    debug: { type: "boolean", default: false },
  });

  const result = ScrapeArgsSchema.safeParse({
    pref: values.pref,
    out: values.out,
    delay: values.delay,
    maxPages: values["max-pages"],
    config: values.config,
    debug: values.debug,
  });

  if (!result.success) {
    throw new CliArgumentError(result.error.errors.map((e) => e.message).join("\n"));
  }
  return result.data;
}

export function parseSnapshotArgs(argv: string[]): SnapshotArgs {
  const { values } = safeParseArgs(argv, {
    "out-dir": { type: "string" },
    config: { type: "string" },
  });
  return { outDir: asOptionalString(values["out-dir"]), config: asOptionalString(values.config) };
}

type OptionSpec = Record<
  string,
  { type: "string"; default?: string } | { type: "boolean"; default?: boolean }
>;

function safeParseArgs(
  argv: string[],
  options: OptionSpec,
): { values: Record<string, string | boolean | undefined> } {
  try {
    const { values } = parseArgs({ args: argv, options, strict: true, allowPositionals: false });
    const normalized: Record<string, string | boolean | undefined> = {};
    for (const [key, value] of Object.entries(values)) {
      normalized[key] = Array.isArray(value) ? value[value.length - 1] : value;
    }
    return { values: normalized };
  } catch (error) {
    throw new CliArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function asOptionalString(value: string | boolean | undefined): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}
