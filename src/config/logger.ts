/**
 * ロガー設定
 * Pino ベースのロギング
 *
 * コンソール出力:
 * - LOG_LEVEL 以上をすべて出力
 * - 開発環境 + LOG_PRETTY=true: 色付きフォーマット (stderr)
 * - それ以外: JSON フォーマット (stdout)
 *
 * ファイル出力 (LOG_TO_FILE=true の場合のみ):
 * - logs/YYYY-MM-DD/scraper.log
 * - logs/YYYY-MM-DD/error.log (エラー統合)
 * - 日次ローテーション、30日保持
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import type { RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone, getDateDirName } from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";

/**
 * 日付ディレクトリにログファイルを作成
 * 構成: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateDirName();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 30,
      compress: false,
      maxSize: "50M",
    },
  );
}

/**
 * ファイル振り分けストリーム
 * エラーは error.log にも書き込む
 */
class FileRoutingStream implements DestinationStream {
  constructor(
    private readonly mainStream: RotatingFileStream,
    private readonly errorStream: RotatingFileStream,
  ) {}

  write(chunk: string): boolean {
    if (isErrorChunk(chunk)) {
      this.errorStream.write(chunk);
    }
    this.mainStream.write(chunk);
    return true;
  }
}

function isErrorChunk(chunk: string): boolean {
  try {
    const parsed: unknown = JSON.parse(chunk);
    if (typeof parsed !== "object" || parsed === null) {
      return false;
    }
    const level = "level" in parsed ? parsed.level : undefined;
    return level === "error" || level === "fatal";
  } catch {
    // JSON でない行はメインログのみ
    return false;
  }
}

const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

const EXCLUDED_FIELDS = [
  "level",
  "time",
  "service",
  "env",
  "pid",
  "hostname",
  "msg",
  "important",
];

/**
 * 開発環境用コンソールフォーマッタ (色付き)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const star = logObj.important === true ? " ⭐" : "";
  const time = new Date().toLocaleTimeString("ja-JP", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";

  console.error(`[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`);

  const fields = Object.keys(logObj).filter((k) => !EXCLUDED_FIELDS.includes(k));
  for (const field of fields) {
    const raw = logObj[field];
    const value =
      typeof raw === "object" && raw !== null
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(raw);
    console.error(`  ${field}: ${value}`);
  }
};

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "zeirishi_scraper",
    env: NODE_ENV,
  },
};

/**
 * コンソール出力 Hook
 * logger.info(obj, msg) / logger.info(msg) の両形式に対応
 */
function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatter(logObj, level);
    },
  };
}

function createLogger(): pino.Logger {
  const usePretty = NODE_ENV === "development" && LOG_PRETTY;

  if (LOG_TO_FILE) {
    const fileStream = new FileRoutingStream(
      createRotatingStream("scraper"),
      createRotatingStream("error"),
    );
    const streams: pino.StreamEntry[] = [{ level: "debug", stream: fileStream }];
    if (usePretty) {
      return pino(
        { ...baseConfig, hooks: createConsoleHook(formatConsolePretty) },
        pino.multistream(streams),
      );
    }
    streams.push({ level: "debug", stream: process.stdout });
    return pino(baseConfig, pino.multistream(streams));
  }

  if (usePretty) {
    // pretty 出力は hook 側で行い、pino 本体の JSON は捨てる
    const sink: DestinationStream = { write: () => true };
    return pino({ ...baseConfig, hooks: createConsoleHook(formatConsolePretty) }, sink);
  }

  return pino(baseConfig);
}

/**
 * メインロガーインスタンス
 */
const logger: pino.Logger = createLogger();

export { logger };

export type Logger = pino.Logger;
