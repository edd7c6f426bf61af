/**
 * wifi-sort Type Definitions
 * Capture records, SSID patterns, categories and configuration
 */

// =============================================================================
// Device Records
// =============================================================================

/**
 * One wireless device observed in a capture.
 * Only `ssid` drives classification; every other field is carried through
 * to the report untouched.
 */
export interface DeviceRecord {
  readonly mac: string;
  /** Empty string when the device broadcast or probed no name */
  readonly ssid: string;
  readonly type: string;
  readonly manufacturer: string;
  readonly encryption: string;
  readonly channel: number | null;
  /** 0 when the capture recorded no frequency */
  readonly frequencyMhz: number;
  readonly rssiLast: number | null;
  readonly rssiMin: number | null;
  readonly rssiMax: number | null;
  readonly packetsTotal: number;
  readonly packetsData: number;
  readonly dataSizeBytes: number;
  /** Epoch seconds, 0 when unknown */
  readonly firstSeen: number;
  /** Epoch seconds, 0 when unknown */
  readonly lastSeen: number;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly altitude: number | null;
}

// =============================================================================
// Patterns
// =============================================================================

export type WildcardKind = 'prefix' | 'suffix' | 'contains';

/**
 * A compiled SSID matching rule.
 * - exact:    `MyNetwork`  - whole SSID equals text
 * - prefix:   `text*`      - SSID starts with text
 * - suffix:   `*text`      - SSID ends with text
 * - contains: `*text*`     - SSID contains text
 * - empty:    `<empty>`    - SSID is empty (hidden network)
 */
export type Pattern =
  | { readonly kind: 'exact'; readonly text: string; readonly source: string }
  | { readonly kind: WildcardKind; readonly text: string; readonly source: string }
  | { readonly kind: 'empty'; readonly source: string };

export type PatternKind = Pattern['kind'];

// =============================================================================
// Categories
// =============================================================================

/**
 * Report categories, one tab each:
 * - client-named:     SSID matches a client pattern
 * - non-client-named: SSID present, not a client, not excluded
 * - unknown-device:   no SSID at all
 */
export type Category = 'client-named' | 'non-client-named' | 'unknown-device';

/**
 * Classifier outcome. `excluded` is not a category: those records are
 * left out of every tab.
 */
export type Classification = Category | 'excluded';

export const CATEGORIES: readonly Category[] = [
  'client-named',
  'non-client-named',
  'unknown-device',
];

export const SHEET_TITLES: Record<Category, string> = {
  'client-named': 'Client-Named',
  'non-client-named': 'Non-Client-Named',
  'unknown-device': 'Unknown Devices',
};

/**
 * Records split by classifier outcome, each list in input order
 */
export interface Partition {
  clientNamed: DeviceRecord[];
  nonClientNamed: DeviceRecord[];
  unknownDevices: DeviceRecord[];
  excluded: DeviceRecord[];
}

export interface SsidCount {
  ssid: string;
  count: number;
}

// =============================================================================
// Configuration
// =============================================================================

export interface WifiSortConfig {
  /** Workbook path, `~` is expanded */
  outputPath: string;
  verbose: boolean;
  /** Pattern-file token that matches the empty SSID */
  emptySsidToken: string;

  report: ReportConfig;
}

export interface ReportConfig {
  maxColumnWidth: number;
  /** Rows sampled per column when sizing widths */
  widthSampleRows: number;
  headerFill: string;
  headerFontColor: string;
  emptySheetMessage: string;
}

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  maxColumnWidth: 30,
  widthSampleRows: 100,
  headerFill: '4472C4',
  headerFontColor: 'FFFFFF',
  emptySheetMessage: 'No matching entries',
};

export const DEFAULT_CONFIG: WifiSortConfig = {
  outputPath: 'output.xlsx',
  verbose: false,
  emptySsidToken: '<empty>',

  report: DEFAULT_REPORT_CONFIG,
};

// =============================================================================
// Errors
// =============================================================================

/**
 * Pattern file missing or unreadable. Raised before any classification.
 */
export class PatternFileError extends Error {
  override readonly name = 'PatternFileError';

  constructor(
    readonly path: string,
    message: string = `Pattern file '${path}' not found or unreadable`,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Capture database missing or not a readable SQLite file
 */
export class CaptureReadError extends Error {
  override readonly name = 'CaptureReadError';

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * No input to a merge produced a device
 */
export class MergeError extends Error {
  override readonly name = 'MergeError';

  constructor(readonly inputs: readonly string[], message: string = 'No devices found in input files') {
    super(message);
  }
}

/**
 * Bad command-line arguments
 */
export class UsageError extends Error {
  override readonly name = 'UsageError';
}
