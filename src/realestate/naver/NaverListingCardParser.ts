import * as cheerio from 'cheerio';
import type { ListingRecord, RawListingItem } from '../../types/ListingRecord';
import { LISTING_CARD_SELECTORS, type ListingCardSelectors } from './NaverSelectors';
import { parseDate, parsePrice, parseSpec } from './NaverFieldParsers';
import { err, ok, type Result } from '../../types/Result';

export type CardParseFailure = 'missing-listing-id' | 'missing-card-body' | 'missing-owner';

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Reads the site-internal listing id from a card's markup, or null if the card has none
 */
export function readListingId(
  html: string,
  selectors: ListingCardSelectors = LISTING_CARD_SELECTORS
): string | null {
  const $ = cheerio.load(html, null, false);
  const id = $(selectors.link).first().attr(selectors.listingIdAttribute);
  return id && id.trim() ? id.trim() : null;
}

/**
 * Extracts the raw text fields of one listing card from its inner HTML
 */
export function parseListingCard(
  html: string,
  selectors: ListingCardSelectors = LISTING_CARD_SELECTORS
): Result<RawListingItem, CardParseFailure> {
  const $ = cheerio.load(html, null, false);

  const listingId = $(selectors.link).first().attr(selectors.listingIdAttribute)?.trim();
  if (!listingId) {
    return err('missing-listing-id');
  }

  const inner = $(selectors.inner).first();
  if (inner.length === 0) {
    return err('missing-card-body');
  }

  const textOf = (selector: string): string => normalizeText(inner.find(selector).first().text());

  const ownerType = textOf(selectors.ownerType);
  if (!ownerType) {
    return err('missing-owner');
  }

  const tags = inner
    .find(selectors.tags)
    .toArray()
    .map((element) => normalizeText($(element).text()))
    .filter((tag) => tag.length > 0);

  return ok({
    listingId,
    ownerType,
    transactionType: textOf(selectors.transactionType),
    priceText: textOf(selectors.price),
    buildingType: textOf(selectors.buildingType),
    specText: textOf(selectors.spec),
    tags,
    confirmedDateText: textOf(selectors.confirmedDate),
  });
}

/**
 * Normalizes a raw card into a listing record for the searched address
 */
export function toListingRecord(item: RawListingItem, address: string): ListingRecord {
  const spec = parseSpec(item.specText);

  return {
    listingId: item.listingId,
    address,
    ownerType: item.ownerType,
    transactionType: item.transactionType,
    price: parsePrice(item.priceText),
    buildingType: item.buildingType,
    areaPyeong: spec.areaPyeong,
    floorInfo: spec.floorInfo,
    direction: spec.direction,
    tags: [...item.tags],
    updatedDate: parseDate(item.confirmedDateText),
    detailUrl: '',
    imageUrls: [],
    description: '',
  };
}
