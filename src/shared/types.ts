/** DITA content types the scaffolder can generate. */
export const CONTENT_TYPES = [
  "concept",
  "task",
  "process",
  "principle",
  "reference",
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export function isContentType(value: string): value is ContentType {
  return (CONTENT_TYPES as readonly string[]).includes(value);
}

/** Free-form body fields keyed by placeholder name. */
export type FieldValues = Record<string, string>;

/** A generated topic, immutable once created. */
export interface ContentItem {
  readonly type: ContentType;
  /** Title as the author entered it. */
  readonly title: string;
  /** Prefixed kebab-case id; doubles as the file base name. */
  readonly id: string;
  readonly fileName: string;
  readonly fields: Readonly<FieldValues>;
  readonly xml: string;
  readonly createdAt: string;
}

/** A single authoring request, before normalization. */
export interface ContentItemRequest {
  type: ContentType;
  title: string;
  fields?: FieldValues;
}

/** Summary view of an item (no XML payload). */
export interface ContentItemSummary {
  type: ContentType;
  title: string;
  id: string;
  fileName: string;
  createdAt: string;
}

/** One topicref line in a chapter map. */
export interface MapEntry {
  href: string;
  /** Root element name of the referenced topic, e.g. "ct_task". */
  topicType: string;
  navtitle: string;
  contentType: ContentType;
}

export interface ChapterMap {
  chapterName: string;
  id: string;
  fileName: string;
  /** Parent topicref when the chapter has at least one concept. */
  parent: MapEntry | null;
  /** Children of `parent`, or root-level refs when there is no parent. */
  entries: MapEntry[];
  xml: string;
}

/** A file destined for an export bundle. */
export interface BundleFile {
  name: string;
  content: Buffer | string;
}
