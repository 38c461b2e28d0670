import type { MergedRecord, RawRecord } from '@vidtrend/shared';

/**
 * Folds raw sightings into one record per bvid.
 *
 * Later sightings overwrite earlier ones field by field (counters are the
 * freshest numbers). `keywords` accumulates, `sourceKeyword` and
 * `firstSeenAt` keep the first sighting, and a missing publish time or
 * duration never erases a known one.
 */
export class RecordMerger {
  private readonly byId = new Map<string, MergedRecord>();

  get size(): number {
    return this.byId.size;
  }

  add(records: Iterable<RawRecord>): void {
    for (const record of records) {
      const existing = this.byId.get(record.bvid);
      this.byId.set(record.bvid, existing ? mergeInto(existing, record) : firstSighting(record));
    }
  }

  /** Merged records in first-seen order */
  values(): MergedRecord[] {
    return [...this.byId.values()];
  }
}

export function mergeRecords(records: Iterable<RawRecord>): MergedRecord[] {
  const merger = new RecordMerger();
  merger.add(records);
  return merger.values();
}

function firstSighting(record: RawRecord): MergedRecord {
  return {
    ...record,
    tags: [...record.tags],
    keywords: [record.sourceKeyword],
    firstSeenAt: record.fetchedAt,
    sightings: 1,
  };
}

function mergeInto(existing: MergedRecord, record: RawRecord): MergedRecord {
  const keywords = existing.keywords.includes(record.sourceKeyword)
    ? existing.keywords
    : [...existing.keywords, record.sourceKeyword];

  return {
    ...record,
    tags: [...record.tags],
    publishedAt: record.publishedAt ?? existing.publishedAt,
    durationSeconds: record.durationSeconds ?? existing.durationSeconds,
    sourceKeyword: existing.sourceKeyword,
    keywords,
    firstSeenAt: existing.firstSeenAt,
    sightings: existing.sightings + 1,
  };
}
