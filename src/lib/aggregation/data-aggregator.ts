/**
 * Data Aggregator
 * Merges the field maps of every crawled page into one EntityRecord
 */

import { PageType } from '../crawling/crawling.types';
import { ExtractionStrategyType, FieldDefinition, FieldSchema, FieldValue } from '../extraction/extraction.types';
import type { PageResult } from '../orchestration/orchestrator.types';
import { foldForComparison } from '../processing';
import { AggregationConflict, ContributingPage, EntityRecord, ResolvedField } from './aggregation.types';
import { deepFreeze } from './freeze';

export interface DataAggregatorOptions {
  clock?: () => Date;
}

/**
 * One field value together with the page it came from
 */
interface Candidate {
  value: string | string[];
  confidence: number;
  sourceUrl: string;
  strategy: ExtractionStrategyType;
  pageType: PageType;
  sequence: number;
}

/**
 * Candidates sharing one folded value
 */
interface CandidateGroup {
  value: string;
  confidence: number;
  strategy: ExtractionStrategyType;
  sources: string[];
  pageTypes: PageType[];
  firstSequence: number;
  authority: number;
}

interface ScalarResolution {
  field: ResolvedField;
  conflict: AggregationConflict | null;
}

function roundConfidence(value: number): number {
  return Math.round(value * 100) / 100;
}

function addUnique<T>(list: T[], item: T): void {
  if (!list.includes(item)) {
    list.push(item);
  }
}

function asText(value: string | string[]): string {
  return Array.isArray(value) ? value.join(', ') : value;
}

export class DataAggregator {
  private clock: () => Date;

  constructor(options: DataAggregatorOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build the record for a site. Input order does not matter: pages are
   * ordered by enqueue sequence before anything is compared.
   */
  aggregate(siteUrl: string, pages: readonly PageResult[], schema: FieldSchema): EntityRecord {
    const ordered = [...pages].sort((a, b) => a.task.sequence - b.task.sequence);

    const fields: Record<string, ResolvedField> = {};
    const absentFields: string[] = [];
    const conflicts: AggregationConflict[] = [];
    const candidateCounts: Record<string, number> = {};

    for (const field of schema.fields) {
      const candidates = this.collectCandidates(ordered, field);
      candidateCounts[field.name] = candidates.length;

      if (candidates.length === 0) {
        absentFields.push(field.name);
        continue;
      }

      if (field.multiple) {
        fields[field.name] = this.mergeList(candidates);
        continue;
      }

      const resolution = this.resolveScalar(field, candidates);
      fields[field.name] = resolution.field;
      if (resolution.conflict) {
        conflicts.push(resolution.conflict);
      }
    }

    return deepFreeze({
      siteUrl,
      fields,
      absentFields,
      confidence: this.overallConfidence(schema, fields),
      unresolvedConflicts: conflicts,
      contributingPages: this.contributingPages(ordered, schema),
      candidateCounts,
      createdAt: this.clock().toISOString(),
    });
  }

  private collectCandidates(pages: readonly PageResult[], field: FieldDefinition): Candidate[] {
    const candidates: Candidate[] = [];

    for (const page of pages) {
      const values: FieldValue[] = page.fields[field.name] ?? [];
      for (const value of values) {
        candidates.push({
          value: value.value,
          confidence: value.confidence,
          sourceUrl: value.sourceUrl,
          strategy: value.strategy,
          pageType: page.pageType,
          sequence: page.task.sequence,
        });
      }
    }

    return candidates;
  }

  /**
   * Rank of the best page type for a field (lower is more authoritative)
   */
  private authorityOf(field: FieldDefinition, pageTypes: PageType[]): number {
    const order = field.authoritativePageTypes ?? [];
    const ranks = pageTypes.map((type) => order.indexOf(type)).filter((rank) => rank >= 0);
    return ranks.length > 0 ? Math.min(...ranks) : Number.POSITIVE_INFINITY;
  }

  /**
   * Group equal values, then rank: confidence, page authority, length, first seen
   */
  private resolveScalar(field: FieldDefinition, candidates: Candidate[]): ScalarResolution {
    const groups = new Map<string, CandidateGroup>();

    for (const candidate of candidates) {
      const text = asText(candidate.value);
      const key = foldForComparison(text);
      const group = groups.get(key);

      if (!group) {
        groups.set(key, {
          value: text,
          confidence: candidate.confidence,
          strategy: candidate.strategy,
          sources: [candidate.sourceUrl],
          pageTypes: [candidate.pageType],
          firstSequence: candidate.sequence,
          authority: Number.POSITIVE_INFINITY,
        });
        continue;
      }

      if (candidate.confidence > group.confidence) {
        group.confidence = candidate.confidence;
        group.strategy = candidate.strategy;
      }
      addUnique(group.sources, candidate.sourceUrl);
      addUnique(group.pageTypes, candidate.pageType);
    }

    const ranked = [...groups.values()];
    for (const group of ranked) {
      group.authority = this.authorityOf(field, group.pageTypes);
    }
    ranked.sort((a, b) => this.compareGroups(a, b) || a.firstSequence - b.firstSequence);

    const [winner] = ranked;
    const tied = ranked.filter((group) => this.compareGroups(winner, group) === 0);

    return {
      field: {
        value: winner.value,
        confidence: winner.confidence,
        sources: winner.sources,
        strategy: winner.strategy,
        pageTypes: winner.pageTypes,
      },
      conflict:
        tied.length > 1
          ? { field: field.name, values: tied.map((group) => group.value), chosen: winner.value, confidence: winner.confidence }
          : null,
    };
  }

  /**
   * Ordering without the first-seen fallback; 0 means a genuine tie
   */
  private compareGroups(a: CandidateGroup, b: CandidateGroup): number {
    if (a.confidence !== b.confidence) {
      return b.confidence - a.confidence;
    }
    if (a.authority !== b.authority) {
      return a.authority < b.authority ? -1 : 1;
    }
    return b.value.length - a.value.length;
  }

  /**
   * Union of items in order of first appearance
   */
  private mergeList(candidates: Candidate[]): ResolvedField {
    const items: string[] = [];
    const seen = new Set<string>();
    const sources: string[] = [];
    const pageTypes: PageType[] = [];
    let best = candidates[0];

    for (const candidate of candidates) {
      const values = Array.isArray(candidate.value) ? candidate.value : [candidate.value];
      for (const item of values) {
        const key = foldForComparison(item);
        if (key && !seen.has(key)) {
          seen.add(key);
          items.push(item);
        }
      }

      addUnique(sources, candidate.sourceUrl);
      addUnique(pageTypes, candidate.pageType);
      if (candidate.confidence > best.confidence) {
        best = candidate;
      }
    }

    return { value: items, confidence: best.confidence, sources, strategy: best.strategy, pageTypes };
  }

  private overallConfidence(schema: FieldSchema, fields: Record<string, ResolvedField>): number {
    let weighted = 0;
    let totalWeight = 0;

    for (const definition of schema.fields) {
      const resolved = fields[definition.name];
      if (!resolved) {
        continue;
      }
      weighted += definition.importanceWeight * resolved.confidence;
      totalWeight += definition.importanceWeight;
    }

    return totalWeight > 0 ? roundConfidence(weighted / totalWeight) : 0;
  }

  private contributingPages(pages: readonly PageResult[], schema: FieldSchema): ContributingPage[] {
    const contributions: ContributingPage[] = [];

    for (const page of pages) {
      const fields = schema.fields
        .map((field) => field.name)
        .filter((name) => (page.fields[name] ?? []).length > 0);

      if (fields.length > 0) {
        contributions.push({ url: page.task.url, pageType: page.pageType, sequence: page.task.sequence, fields });
      }
    }

    return contributions;
  }
}

export const dataAggregator = new DataAggregator();
