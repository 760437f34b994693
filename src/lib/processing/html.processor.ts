/**
 * HTML Processor
 * Parsing and visible-text extraction shared by classification, extraction and rendering checks
 */

import * as cheerio from 'cheerio';
import { cleanText } from './text.processor';

export interface HtmlProcessorConfig {
  /**
   * Selectors removed before reading visible text
   */
  noiseSelectors?: string[];

  /**
   * Input beyond this many characters is truncated (default 10MB)
   */
  maxHtmlLength?: number;
}

export interface ProcessedHtml {
  $: cheerio.CheerioAPI;
  text: string;
  metadata: {
    originalLength: number;
    textLength: number;
    truncated: boolean;
  };
}

const DEFAULT_NOISE_SELECTORS = ['script', 'style', 'noscript', 'template', 'svg', 'iframe'];

export class HtmlProcessor {
  private config: Required<HtmlProcessorConfig>;

  constructor(config?: HtmlProcessorConfig) {
    this.config = {
      noiseSelectors: config?.noiseSelectors || DEFAULT_NOISE_SELECTORS,
      maxHtmlLength: config?.maxHtmlLength || 10 * 1024 * 1024,
    };
  }

  /**
   * Parse HTML into a document that keeps every tag (scripts included)
   */
  load(html: string): cheerio.CheerioAPI {
    return cheerio.load(this.truncate(html));
  }

  /**
   * Parse HTML and read its visible text
   */
  process(html: string): ProcessedHtml {
    const originalLength = html.length;
    const truncated = originalLength > this.config.maxHtmlLength;
    if (truncated) {
      console.warn(`HTML truncated from ${originalLength} to ${this.config.maxHtmlLength} bytes`);
    }

    const $ = this.load(html);
    const text = this.visibleText(html);

    return {
      $,
      text,
      metadata: {
        originalLength,
        textLength: text.length,
        truncated,
      },
    };
  }

  /**
   * Whitespace-collapsed text a reader would see
   */
  visibleText(html: string): string {
    if (!html || html.trim().length === 0) {
      return '';
    }

    // Separate copy: noise removal must not touch the document strategies read
    const $ = cheerio.load(this.truncate(html));
    $(this.config.noiseSelectors.join(',')).remove();
    $('br').replaceWith('\n');
    $('p, div, li, h1, h2, h3, h4, h5, h6, tr, section, article, header, footer').append('\n');

    const text = $('body').length > 0 ? $('body').text() : $.root().text();
    return cleanText(text);
  }

  private truncate(html: string): string {
    return html.length > this.config.maxHtmlLength ? html.substring(0, this.config.maxHtmlLength) : html;
  }
}

export const htmlProcessor = new HtmlProcessor();
