/**
 * Authoring Session
 *
 * The per-session context object: holds generated topics in memory, in
 * submission order, until they are exported. Items are frozen on creation.
 */

import { v4 as uuidv4 } from "uuid";
import { normalize, topicFileName } from "../naming/normalizer.js";
import { DuplicateItemError, LimitExceededError } from "../shared/errors.js";
import type {
  ContentItem,
  ContentItemRequest,
  ContentItemSummary,
  ContentType,
  FieldValues,
} from "../shared/types.js";
import type { TemplateBinder } from "../templates/binder.js";

export interface SessionOptions {
  id?: string;
  /** Upper bound on topics of a single content type. */
  maxItemsPerType?: number;
  now?: () => Date;
}

/** A topic recovered from an exported bundle. */
export interface RestoredTopic {
  type: ContentType;
  title: string;
  id: string;
  xml: string;
}

export const DEFAULT_MAX_ITEMS_PER_TYPE = 100;

export class AuthoringSession {
  readonly id: string;
  readonly createdAt: string;
  private items = new Map<string, ContentItem>();
  private maxItemsPerType: number;
  private now: () => Date;

  constructor(
    private readonly binder: TemplateBinder,
    options: SessionOptions = {},
  ) {
    this.id = options.id ?? uuidv4();
    this.now = options.now ?? (() => new Date());
    this.maxItemsPerType = options.maxItemsPerType ?? DEFAULT_MAX_ITEMS_PER_TYPE;
    this.createdAt = this.now().toISOString();
  }

  // ── Queries ────────────────────────────────────────────────

  get size(): number {
    return this.items.size;
  }

  get(id: string): ContentItem | undefined {
    return this.items.get(id);
  }

  list(): ContentItem[] {
    return [...this.items.values()];
  }

  summaries(): ContentItemSummary[] {
    return this.list().map(({ type, title, id, fileName, createdAt }) => ({
      type, title, id, fileName, createdAt,
    }));
  }

  countByType(): Record<ContentType, number> {
    const counts: Record<ContentType, number> = {
      concept: 0, task: 0, process: 0, principle: 0, reference: 0,
    };
    for (const item of this.items.values()) counts[item.type]++;
    return counts;
  }

  // ── Mutations ──────────────────────────────────────────────

  /** Normalize, bind, and store one topic. */
  add(request: ContentItemRequest): ContentItem {
    const [item] = this.commit([this.prepare(request)]);
    return item;
  }

  /**
   * Add several topics at once. Every request is validated before any is
   * stored, so a failing batch leaves the session untouched.
   */
  addBatch(requests: ContentItemRequest[]): ContentItem[] {
    return this.commit(requests.map((request) => this.prepare(request)));
  }

  /**
   * Store topics read back from an archive, keeping their XML as-is.
   * All-or-nothing, like addBatch.
   */
  restore(topics: RestoredTopic[]): ContentItem[] {
    const noFields: FieldValues = {};
    return this.commit(
      topics.map((topic) =>
        Object.freeze({
          type: topic.type,
          title: topic.title,
          id: topic.id,
          fileName: topicFileName(topic.id),
          fields: Object.freeze(noFields),
          xml: topic.xml,
          createdAt: this.now().toISOString(),
        }),
      ),
    );
  }

  remove(id: string): boolean {
    return this.items.delete(id);
  }

  clear(): void {
    this.items.clear();
  }

  // ── Internals ──────────────────────────────────────────────

  private prepare(request: ContentItemRequest): ContentItem {
    const title = request.title.trim();
    const id = normalize(request.type, title);
    const fields: FieldValues = { ...(request.fields ?? {}), id, title };
    const xml = this.binder.bind(request.type, fields);

    return Object.freeze({
      type: request.type,
      title,
      id,
      fileName: topicFileName(id),
      fields: Object.freeze(fields),
      xml,
      createdAt: this.now().toISOString(),
    });
  }

  private commit(items: ContentItem[]): ContentItem[] {
    const pending = new Map<string, ContentItem>();
    const perType = new Map<ContentType, number>();

    for (const item of items) {
      this.checkDuplicate(item.id, item.title, this.items);
      this.checkDuplicate(item.id, item.title, pending);
      pending.set(item.id, item);
      perType.set(item.type, (perType.get(item.type) ?? 0) + 1);
    }
    for (const [type, adding] of perType) {
      this.checkLimit(type, adding);
    }

    for (const item of pending.values()) {
      this.items.set(item.id, item);
    }
    return [...pending.values()];
  }

  private checkDuplicate(id: string, title: string, existing: Map<string, ContentItem>): void {
    const clash = existing.get(id);
    if (clash) throw new DuplicateItemError(id, title, clash.title);
  }

  private checkLimit(type: ContentType, adding: number): void {
    if (this.countByType()[type] + adding > this.maxItemsPerType) {
      throw new LimitExceededError(type, this.maxItemsPerType);
    }
  }
}
