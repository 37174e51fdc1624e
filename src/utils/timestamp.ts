/**
 * タイムスタンプユーティリティ
 */

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * タイムゾーン付きタイムスタンプ
 * ISO 8601 形式 (例: 2025-10-30T12:34:56.789+09:00)
 *
 * TZ 環境変数のローカルタイムゾーンを反映する
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;

  return `${date}T${time}${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`;
}

/**
 * ログ用の日付ディレクトリ名 (YYYY-MM-DD, ローカルタイムゾーン)
 */
export function getDateDirName(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}
