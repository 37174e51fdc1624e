/**
 * SpreadsheetExporter
 *
 * 1 ファイル 2 シート:
 * - {県}_全件_メールなしのみ
 * - {県}_メールあり
 *
 * 列順は EXPORT_COLUMNS 固定。detailUrl / missingFields は出力しない
 */

import { Workbook } from "exceljs";
import type { ListingRecord } from "@/core/domain/ListingRecord";
import { ScrapeError, ScrapeErrorType } from "@/core/domain/ScrapeError";
import type { AggregatedRecords } from "@/services/RecordAggregator";
import {
  APP_METADATA,
  EXPORT_COLUMNS,
  OUTPUT_CONFIG,
  SHEET_NAMES,
  type ExportColumnKey,
} from "@/config/constants";
import { logger as defaultLogger, Logger } from "@/config/logger";

export type ExportRow = Record<ExportColumnKey, string>;

export interface SheetTable {
  name: string;
  headers: string[];
  rows: string[][];
}

/** 列幅 (文字数) */
const COLUMN_WIDTHS: Record<ExportColumnKey, number> = {
  prefecture: 8,
  officeName: 32,
  representativeName: 16,
  phone: 16,
  email: 32,
  address: 48,
  registrationEra: 24,
};

/**
 * レコード → 出力行
 */
export function toExportRow(record: ListingRecord): ExportRow {
  return {
    prefecture: record.prefecture,
    officeName: record.officeName,
    representativeName: record.representativeName,
    phone: record.phone,
    email:
      record.email.status === "found"
        ? record.email.address
        : OUTPUT_CONFIG.NO_EMAIL_SENTINEL,
    address: record.address,
    registrationEra: record.registrationEra,
  };
}

export class SpreadsheetExporter {
  constructor(
    private readonly logger: Logger = defaultLogger,
    /** ブックの作成・更新日時 (メタデータのみ) */
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * シートごとの表 (メモリ上)
   * シート順: メールなし → メールあり
   */
  toTables(prefecture: string, aggregated: AggregatedRecords): SheetTable[] {
    const headers = EXPORT_COLUMNS.map((c) => c.header);
    const toCells = (record: ListingRecord): string[] => {
      const row = toExportRow(record);
      return EXPORT_COLUMNS.map((c) => row[c.key]);
    };

    return [
      {
        name: SHEET_NAMES.withoutEmail(prefecture),
        headers,
        rows: aggregated.withoutEmail.map(toCells),
      },
      {
        name: SHEET_NAMES.withEmail(prefecture),
        headers,
        rows: aggregated.withEmail.map(toCells),
      },
    ];
  }

  /**
   * xlsx ファイルとして書き出す
   * ブック生成・書き込みの失敗は OUTPUT_WRITE_FAILED として伝播
   */
  async write(
    outPath: string,
    prefecture: string,
    aggregated: AggregatedRecords,
  ): Promise<SheetTable[]> {
    const tables = this.toTables(prefecture, aggregated);
    try {
      const workbook = this.buildWorkbook(tables);
      await workbook.xlsx.writeFile(outPath);
    } catch (error) {
      throw new ScrapeError(
        ScrapeErrorType.OUTPUT_WRITE_FAILED,
        `Failed to write spreadsheet: ${outPath}`,
        { cause: error },
      );
    }

    this.logger.info(
      {
        out_path: outPath,
        sheets: tables.map((t) => ({ name: t.name, rows: t.rows.length })),
      },
      "Excel 出力完了",
    );

    return tables;
  }

  private buildWorkbook(tables: SheetTable[]): Workbook {
    const workbook = new Workbook();
    const now = this.clock();
    workbook.creator = APP_METADATA.NAME;
    workbook.created = now;
    workbook.modified = now;

    for (const table of tables) {
      const sheet = workbook.addWorksheet(table.name);
      sheet.columns = EXPORT_COLUMNS.map((c) => ({
        header: c.header,
        key: c.key,
        width: COLUMN_WIDTHS[c.key],
      }));
      sheet.getRow(1).font = { bold: true };
      sheet.addRows(table.rows);
    }

    return workbook;
  }
}
