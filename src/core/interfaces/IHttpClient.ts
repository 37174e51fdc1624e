/**
 * HTTP クライアントインターフェース
 *
 * 実装は 1 回の実行を通じて 1 インスタンスを直列に使い回す
 */

export type QueryParams = Record<string, string | number>;

export interface HttpResponse {
  /** 最終的な URL (リダイレクト後) */
  url: string;
  status: number;
  body: string;
}

export interface IHttpClient {
  /**
   * GET リクエスト
   *
   * 2xx 以外・タイムアウト・ネットワークエラーは ScrapeError で reject
   */
  get(url: string, query?: QueryParams): Promise<HttpResponse>;
}
