/**
 * Semantic Markup Strategy
 * Microdata (itemscope/itemprop) plus semantic tags: <address>, tel: and mailto: links
 */

import * as cheerio from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { BaseExtractionStrategy } from '../extraction.strategy';
import {
  ExtractionContext,
  ExtractionStrategyType,
  FieldDefinition,
  FieldSchema,
  RawCandidates,
} from '../extraction.types';
import { CONTAINER_PROPS, formatPostalAddress, looksLikeAbsoluteUrl, matchesEntityType } from './schema-org.utils';

const URL_VALUE_TAGS = ['a', 'area', 'link'];
const SRC_VALUE_TAGS = ['img', 'audio', 'video', 'source', 'iframe', 'embed'];
const CONTAINER_SELECTOR = CONTAINER_PROPS.map((prop) => `[itemprop~="${prop}"]`).join(', ');

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export class SemanticMarkupStrategy extends BaseExtractionStrategy {
  name = 'Microdata & Semantic Tags';
  type = ExtractionStrategyType.SEMANTIC_MARKUP;
  baseConfidence = 0.7;

  protected collect(context: ExtractionContext, fields: FieldDefinition[], schema: FieldSchema): RawCandidates {
    const { $ } = context;
    const candidates: RawCandidates = new Map();

    $('[itemscope][itemtype]').each((_, scope) => {
      if (!matchesEntityType($(scope).attr('itemtype'), schema.entityTypes)) {
        return;
      }

      for (const field of fields) {
        for (const key of this.keysFor(field)) {
          const values = field.multiple
            ? this.collectList($, scope, key, field)
            : this.collectScalar($, scope, key, field);
          this.push(candidates, field.name, values);
        }
      }
    });

    for (const field of fields) {
      if (!candidates.has(field.name)) {
        this.push(candidates, field.name, this.collectSemanticTags($, field));
      }
    }

    return candidates;
  }

  /**
   * Nearest enclosing item scope, not counting the element itself
   */
  private ownerOf($: cheerio.CheerioAPI, el: Element): AnyNode | undefined {
    return $(el).parent().closest('[itemscope]').get(0);
  }

  /**
   * Properties that belong directly to a scope (not to a nested item)
   */
  private ownedProps($: cheerio.CheerioAPI, scope: Element, prop: string): Element[] {
    return $(scope)
      .find(`[itemprop~="${prop}"]`)
      .toArray()
      .filter((el) => this.ownerOf($, el) === scope);
  }

  private collectScalar($: cheerio.CheerioAPI, scope: Element, key: string, field: FieldDefinition): string[] {
    const values: string[] = [];

    for (const el of this.ownedProps($, scope, key)) {
      const value = $(el).is('[itemscope]') ? this.nestedItemValue($, el) : this.propValue($, el);
      if (value) {
        values.push(value);
      }
    }

    return field.format === 'url' ? values : values.filter((value) => !looksLikeAbsoluteUrl(value));
  }

  /**
   * List fields take every matching descendant, skipping menus and sections that only hold items
   */
  private collectList($: cheerio.CheerioAPI, scope: Element, key: string, field: FieldDefinition): string[] {
    const values: string[] = [];

    $(scope)
      .find(`[itemprop~="${key}"]`)
      .each((_, el) => {
        const node = $(el);
        if (node.is('[itemscope]')) {
          if (node.find(CONTAINER_SELECTOR).length > 0) {
            return;
          }
          const name = this.nestedItemValue($, el);
          if (name) {
            values.push(name);
          }
          return;
        }

        const value = this.propValue($, el);
        if (value && (field.format === 'url' || !looksLikeAbsoluteUrl(value))) {
          values.push(value);
        }
      });

    return values;
  }

  /**
   * Value of a nested item: formatted PostalAddress, otherwise its name
   */
  private nestedItemValue($: cheerio.CheerioAPI, item: Element): string | null {
    const prop = (name: string): string | undefined => {
      const el = this.ownedProps($, item, name)[0];
      return el ? this.propValue($, el) ?? undefined : undefined;
    };

    const street = prop('streetAddress');
    if (matchesEntityType($(item).attr('itemtype'), ['PostalAddress']) || street) {
      const formatted = formatPostalAddress({
        streetAddress: street,
        addressLocality: prop('addressLocality'),
        addressRegion: prop('addressRegion'),
        postalCode: prop('postalCode'),
      });
      return formatted || null;
    }

    return prop('name') ?? null;
  }

  /**
   * Microdata property value by element kind
   */
  private propValue($: cheerio.CheerioAPI, el: Element): string | null {
    const node = $(el);
    const tag = el.tagName.toLowerCase();

    const content = node.attr('content');
    if (content !== undefined) {
      return content.trim() || null;
    }

    if (URL_VALUE_TAGS.includes(tag)) {
      return node.attr('href')?.trim() || null;
    }
    if (SRC_VALUE_TAGS.includes(tag)) {
      return node.attr('src')?.trim() || null;
    }
    if (tag === 'time') {
      return (node.attr('datetime') ?? node.text()).trim() || null;
    }
    if (tag === 'data' || tag === 'meter') {
      return (node.attr('value') ?? node.text()).trim() || null;
    }

    return node.text().trim() || null;
  }

  /**
   * Semantic tags for fields microdata did not provide
   */
  private collectSemanticTags($: cheerio.CheerioAPI, field: FieldDefinition): string[] {
    switch (field.format) {
      case 'address':
        return this.addressTagValues($);
      case 'phone':
        return this.hrefValues($, 'tel:');
      case 'email':
        return this.hrefValues($, 'mailto:');
      default:
        return [];
    }
  }

  /**
   * <address> text without its phone and e-mail lines
   */
  private addressTagValues($: cheerio.CheerioAPI): string[] {
    const values: string[] = [];

    $('address').each((_, el) => {
      const node = $(el).clone();
      node.find('br').replaceWith('\n');
      node.find('a[href^="tel:"], a[href^="mailto:"]').remove();

      const lines = node
        .text()
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line && !line.includes('@') && !/^(phone|tel|call|email)\b/i.test(line));

      if (lines.length > 0) {
        values.push(lines.join(', '));
      }
    });

    return values;
  }

  private hrefValues($: cheerio.CheerioAPI, scheme: string): string[] {
    const values: string[] = [];

    $(`a[href^="${scheme}"]`).each((_, el) => {
      const href = $(el).attr('href') ?? '';
      const value = safeDecode(href.slice(scheme.length)).trim();
      if (value) {
        values.push(value);
      }
    });

    return values;
  }
}
