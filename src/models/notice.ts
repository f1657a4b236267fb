/**
 * Notice record interfaces for the Notice Accuracy MCP System
 *
 * One record per document (keyed by PDF file name) holding the seven
 * extracted fields. The ground-truth sheet and every model sheet share
 * this shape.
 */

/**
 * Fields extracted from every notice, in sheet column order
 */
export enum NoticeField {
  /** Account number printed by the vendor */
  VENDOR_ACCOUNT_NUMBER = 'Vendor Account Number',

  VENDOR_NAME = 'Vendor Name',

  SERVICE_ADDRESS = 'Service Address',

  /** One of NOTICE_CATEGORIES (not enforced on load) */
  NOTICE_CATEGORY = 'Notice Category',

  /** YYYY-MM-DD, compared as text */
  NOTICE_DATE = 'Notice Date',

  /** Only meaningful for impact-bearing categories, otherwise "NA" */
  IMPACT_DATE = 'Impact Date',

  /** Only meaningful for impact-bearing categories, otherwise "NA" */
  IMPACT_AMOUNT = 'Impact Amount',
}

/** Key column of every sheet */
export const DOCUMENT_ID_COLUMN = 'PDF Name';

/** The seven compared fields in column order */
export const NOTICE_FIELDS: readonly NoticeField[] = [
  NoticeField.VENDOR_ACCOUNT_NUMBER,
  NoticeField.VENDOR_NAME,
  NoticeField.SERVICE_ADDRESS,
  NoticeField.NOTICE_CATEGORY,
  NoticeField.NOTICE_DATE,
  NoticeField.IMPACT_DATE,
  NoticeField.IMPACT_AMOUNT,
];

/** Canonical header row: key column followed by the seven fields */
export const SHEET_COLUMNS: readonly string[] = [DOCUMENT_ID_COLUMN, ...NOTICE_FIELDS];

/**
 * Fields whose joint match marks a vendor as identified
 */
export const IDENTITY_FIELDS: readonly NoticeField[] = [
  NoticeField.VENDOR_ACCOUNT_NUMBER,
  NoticeField.VENDOR_NAME,
  NoticeField.SERVICE_ADDRESS,
];

/**
 * Closed notice category vocabulary, in reporting order
 */
export const NOTICE_CATEGORIES = [
  'Late Notice',
  'Maintenance',
  'Address Change',
  'Cheque Received',
  'Disconnect Notice',
  'Rate Change',
  'Revert to Owner',
  '3rd Party Audit',
  'Others',
] as const;

export type NoticeCategory = (typeof NOTICE_CATEGORIES)[number];

const CATEGORY_SET: ReadonlySet<string> = new Set(NOTICE_CATEGORIES);

/** Categories for which impact date and amount are evaluated */
export const IMPACT_BEARING_CATEGORIES: readonly NoticeCategory[] = [
  'Disconnect Notice',
  'Late Notice',
];

/** Value used when a field does not apply or was not found */
export const NOT_APPLICABLE = 'NA';

/** Default category written when an extractor omits one */
export const DEFAULT_CATEGORY: NoticeCategory = 'Others';

/**
 * Fixed-shape field values of one notice
 */
export type NoticeFields = Record<NoticeField, string>;

/**
 * One sheet row: the document identifier plus its field values
 */
export interface NoticeRecord {
  pdf_name: string;
  fields: NoticeFields;
}

/**
 * Records of one sheet keyed by document identifier
 */
export type RecordTable = Map<string, NoticeRecord>;

/**
 * Check whether a raw category string belongs to the closed vocabulary
 */
export function isNoticeCategory(value: string): value is NoticeCategory {
  return CATEGORY_SET.has(value);
}

/**
 * Check whether a raw category string is one of the impact-bearing categories
 */
export function isImpactBearingCategory(value: string): boolean {
  return isNoticeCategory(value) && IMPACT_BEARING_CATEGORIES.includes(value);
}

/**
 * Build a NoticeFields value with every field empty, then apply overrides
 */
export function emptyNoticeFields(overrides: Partial<NoticeFields> = {}): NoticeFields {
  return {
    [NoticeField.VENDOR_ACCOUNT_NUMBER]: '',
    [NoticeField.VENDOR_NAME]: '',
    [NoticeField.SERVICE_ADDRESS]: '',
    [NoticeField.NOTICE_CATEGORY]: '',
    [NoticeField.NOTICE_DATE]: '',
    [NoticeField.IMPACT_DATE]: '',
    [NoticeField.IMPACT_AMOUNT]: '',
    ...overrides,
  };
}
