/**
 * Every selector into the listings site, keyed by logical role.
 * The site's markup drifts, so each role lists candidates in the order they
 * are tried. Swap the table to follow markup changes without touching the
 * crawl logic.
 */

export interface SelectorCandidate {
  selector: string;
  timeoutMs: number;
}

export type SelectorRole =
  | 'searchInput'
  | 'filterPanelToggle'
  | 'applyButton'
  | 'marker'
  | 'listingItem'
  | 'areaOptionList';

export type SelectorTable = Record<SelectorRole, readonly SelectorCandidate[]>;

/** Site filter dimensions, by the `filtername` attribute of their toggle group */
export type FilterDimension = 'tradTpCd' | 'rletTpCd';

export type RangeField = 'salePrice' | 'deposit' | 'monthlyRent';

export interface RangeInputIds {
  min: string;
  max: string;
}

export const NAVER_SELECTORS: SelectorTable = {
  searchInput: [{ selector: '#search', timeoutMs: 10000 }],
  filterPanelToggle: [
    { selector: 'a.header_option_add._optionChange', timeoutMs: 15000 },
    { selector: 'a._optionChange', timeoutMs: 5000 },
    { selector: '.header_option_add', timeoutMs: 5000 },
    { selector: "a[class*='option']", timeoutMs: 5000 },
    { selector: "a[href*='option']", timeoutMs: 5000 },
  ],
  applyButton: [
    { selector: 'a.btn_option.btn_option--search._filterSaveBtn', timeoutMs: 10000 },
    { selector: '._filterSaveBtn', timeoutMs: 5000 },
  ],
  marker: [
    { selector: '.marker_circle_count', timeoutMs: 15000 },
    { selector: '.marker_count', timeoutMs: 5000 },
    { selector: "[class*='marker']", timeoutMs: 5000 },
    { selector: "[class*='circle_count']", timeoutMs: 5000 },
    { selector: '.map_marker', timeoutMs: 5000 },
    { selector: '.cluster_marker', timeoutMs: 5000 },
  ],
  listingItem: [{ selector: '.item_area._Listitem', timeoutMs: 2000 }],
  areaOptionList: [{ selector: '#filterLayer #ct', timeoutMs: 5000 }],
};

export const RANGE_INPUT_IDS: Record<RangeField, RangeInputIds> = {
  salePrice: { min: '#dprcMin', max: '#dprcMax' },
  deposit: { min: '#wprcMin', max: '#wprcMax' },
  monthlyRent: { min: '#rprcMin', max: '#rprcMax' },
};

/**
 * Toggle label for one option of a multi-select filter group.
 * Only the main panel is targeted; the compact complex filter repeats the same inputs.
 */
export function filterToggleSelector(dimension: FilterDimension, label: string): string {
  const escaped = label.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  return `div.article_box--option:not(._complexFilterBox) div._multiFilter[filtername='${dimension}'] input[headernm='${escaped}'] + label`;
}

/**
 * Fields inside one listing card, relative to the card element
 */
export const LISTING_CARD_SELECTORS = {
  link: 'a.item_link',
  listingIdAttribute: '_articleno',
  inner: '.item_inner',
  ownerType: 'em.title_place',
  transactionType: 'div.price_area > span.type',
  price: 'div.price_area > strong.price',
  buildingType: 'div.information_area p.info > strong.type',
  spec: 'div.information_area p.info > span.spec',
  tags: 'div.tag_area > em.tag',
  confirmedDate: 'span.icon-badge.type-confirmed',
} as const;

export type ListingCardSelectors = { readonly [K in keyof typeof LISTING_CARD_SELECTORS]: string };
