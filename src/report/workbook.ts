/**
 * Report Builder - renders categorized devices as an .xlsx workbook
 *
 * One sheet per category, in tab order Client-Named, Non-Client-Named,
 * Unknown Devices. Each sheet has a styled header row and one row per device;
 * an empty category gets a single "No matching entries" cell.
 */

import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import type { Category, DeviceRecord, ReportConfig } from '../types/index.js';
import { CATEGORIES, DEFAULT_REPORT_CONFIG, SHEET_TITLES } from '../types/index.js';
import { resolveOutputPath } from '../utils/paths.js';

export type ReportCell = string | number | null;

export interface ReportColumn {
  header: string;
  value: (record: DeviceRecord) => ReportCell;
}

export type CategorizedDevices = Record<Category, readonly DeviceRecord[]>;

// =============================================================================
// Formatting
// =============================================================================

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Local `YYYY-MM-DD HH:mm:ss` for epoch seconds; '' when the time is unknown (0)
 */
export function formatTimestamp(epochSeconds: number): string {
  if (!epochSeconds) {
    return '';
  }
  const d = new Date(epochSeconds * 1000);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export const REPORT_COLUMNS: readonly ReportColumn[] = [
  { header: 'MAC', value: r => r.mac },
  { header: 'SSID', value: r => r.ssid },
  { header: 'Type', value: r => r.type },
  { header: 'Manufacturer', value: r => r.manufacturer },
  { header: 'Encryption', value: r => r.encryption },
  { header: 'Channel', value: r => r.channel },
  { header: 'Frequency_MHz', value: r => r.frequencyMhz },
  { header: 'RSSI_Last', value: r => r.rssiLast },
  { header: 'RSSI_Min', value: r => r.rssiMin },
  { header: 'RSSI_Max', value: r => r.rssiMax },
  { header: 'Packets_Total', value: r => r.packetsTotal },
  { header: 'Packets_Data', value: r => r.packetsData },
  { header: 'Data_Size_Bytes', value: r => r.dataSizeBytes },
  { header: 'First_Seen', value: r => formatTimestamp(r.firstSeen) },
  { header: 'Last_Seen', value: r => formatTimestamp(r.lastSeen) },
  { header: 'Latitude', value: r => r.latitude },
  { header: 'Longitude', value: r => r.longitude },
  { header: 'Altitude_m', value: r => r.altitude },
];

/**
 * Longest of the header and the sampled values, plus 2, capped at
 * `maxColumnWidth`
 */
export function columnWidth(
  header: string,
  values: readonly ReportCell[],
  config: Pick<ReportConfig, 'maxColumnWidth' | 'widthSampleRows'> = DEFAULT_REPORT_CONFIG
): number {
  let longest = header.length;
  for (const value of values.slice(0, config.widthSampleRows)) {
    longest = Math.max(longest, value === null ? 0 : String(value).length);
  }
  return Math.min(longest + 2, config.maxColumnWidth);
}

// =============================================================================
// Workbook
// =============================================================================

function argb(hex: string): string {
  return `FF${hex.toUpperCase()}`;
}

/**
 * Fill a worksheet with one row per record
 */
export function writeSheet(
  sheet: Worksheet,
  records: readonly DeviceRecord[],
  config: ReportConfig = DEFAULT_REPORT_CONFIG
): void {
  if (records.length === 0) {
    sheet.getCell(1, 1).value = config.emptySheetMessage;
    return;
  }

  REPORT_COLUMNS.forEach((column, index) => {
    const cell = sheet.getCell(1, index + 1);
    cell.value = column.header;
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: argb(config.headerFill) } };
    cell.font = { bold: true, color: { argb: argb(config.headerFontColor) } };
    cell.alignment = { horizontal: 'center' };
  });

  records.forEach((record, rowIndex) => {
    REPORT_COLUMNS.forEach((column, colIndex) => {
      const value = column.value(record);
      if (value !== null) {
        sheet.getCell(rowIndex + 2, colIndex + 1).value = value;
      }
    });
  });

  REPORT_COLUMNS.forEach((column, index) => {
    const values = records.slice(0, config.widthSampleRows).map(column.value);
    sheet.getColumn(index + 1).width = columnWidth(column.header, values, config);
  });
}

export function buildWorkbook(
  devices: CategorizedDevices,
  config: ReportConfig = DEFAULT_REPORT_CONFIG
): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'wifi-sort';
  workbook.created = new Date();

  for (const category of CATEGORIES) {
    const sheet = workbook.addWorksheet(SHEET_TITLES[category]);
    writeSheet(sheet, devices[category], config);
  }

  return workbook;
}

/**
 * Build the workbook and write it to `outputPath`
 * @returns the resolved output path
 */
export async function writeReport(
  outputPath: string,
  devices: CategorizedDevices,
  config: ReportConfig = DEFAULT_REPORT_CONFIG
): Promise<string> {
  const resolved = resolveOutputPath(outputPath);
  await buildWorkbook(devices, config).xlsx.writeFile(resolved);
  return resolved;
}
