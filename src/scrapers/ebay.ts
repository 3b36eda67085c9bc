import axios from 'axios';
import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { writeFile } from 'node:fs/promises';
import { config } from '../config.js';
import type { CandidateListing, ListingSource } from './types.js';

const SEARCH_URL = 'https://www.ebay.com/sch/i.html';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Current sold-items card layout first, then the older s-item layouts
const LISTING_SELECTORS = [
  "div[class*='card-container']",
  'li.s-item',
  'div.s-item__info.clearfix',
  'div.s-item__info',
];

const ITEM_LINK_SELECTOR = "a[href*='/itm/']";

// Never rendered as text
const HIDDEN_TAGS = new Set(['script', 'style']);

export interface EbaySoldSourceOptions {
  timeoutMs?: number;
  saveDebugHtml?: boolean;
  debugHtmlPath?: string;
}

export function buildSoldSearchParams(query: string): Record<string, string> {
  return {
    _nkw: query,
    LH_Sold: '1',
    LH_Complete: '1',
    LH_ItemCondition: '1000', // New
    _sop: '13', // End date: recent first
  };
}

function collectText(node: AnyNode, out: string[]): void {
  if (isTag(node) && HIDDEN_TAGS.has(node.name)) return;
  if (isText(node)) {
    const text = node.data.trim();
    if (text) out.push(text);
  } else if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, out);
    }
  }
}

/** Visible text nodes of `node`, each trimmed, joined with `separator`. */
export function visibleText(node: AnyNode, separator = ' '): string {
  const parts: string[] = [];
  collectText(node, parts);
  return parts.join(separator);
}

function findCards($: cheerio.CheerioAPI): Element[] {
  for (const selector of LISTING_SELECTORS) {
    const cards = $(selector).toArray().filter(isTag);
    if (cards.length > 0) return cards;
  }
  return [];
}

export function parseSoldListings(html: string): CandidateListing[] {
  const $ = cheerio.load(html);

  const listings: CandidateListing[] = [];
  for (const card of findCards($)) {
    const anchor = $(card).find(ITEM_LINK_SELECTOR).first();
    const anchorNode = anchor.get(0);
    if (!anchorNode) continue;

    listings.push({
      // Title fragments are glued together: "New Listing" + "Apple iPhone" -> "New ListingApple iPhone"
      title: visibleText(anchorNode, ''),
      text_block: visibleText(card),
      link: anchor.attr('href') ?? null,
    });
  }

  return listings;
}

export async function fetchSoldSearchHtml(
  query: string,
  timeoutMs: number
): Promise<string> {
  const { data } = await axios.get<string>(SEARCH_URL, {
    params: buildSoldSearchParams(query),
    headers: { 'User-Agent': USER_AGENT },
    timeout: timeoutMs,
    responseType: 'text',
  });
  return data;
}

export function createEbaySoldSource(
  options: EbaySoldSourceOptions = {}
): ListingSource {
  const timeoutMs = options.timeoutMs ?? config.REQUEST_TIMEOUT_MS;
  const saveDebugHtml = options.saveDebugHtml ?? config.SAVE_DEBUG_HTML;
  const debugHtmlPath = options.debugHtmlPath ?? config.DEBUG_HTML_PATH;

  return {
    async fetchListings(query: string): Promise<CandidateListing[]> {
      const html = await fetchSoldSearchHtml(query, timeoutMs);

      if (saveDebugHtml) {
        try {
          await writeFile(debugHtmlPath, html, 'utf-8');
          console.log(`[ebay] Saved raw HTML to ${debugHtmlPath}`);
        } catch (error) {
          const errMessage = error instanceof Error ? error.message : String(error);
          console.error(`[ebay] Failed to save debug HTML: ${errMessage}`);
        }
      }

      const listings = parseSoldListings(html);
      console.log(`[ebay] Found ${listings.length} potential listings for '${query}'`);
      return listings;
    },
  };
}
