import type { Logger } from '../../utils/logger';
import { describeError } from '../../utils/logger';
import { AreaBucket, type NumericRange, type SearchFilter } from '../../types/SearchFilter';
import type { CrawlPage } from './PageDriver';
import type { CrawlDiagnostics } from './CrawlDiagnostics';
import {
  NAVER_SELECTORS,
  RANGE_INPUT_IDS,
  filterToggleSelector,
  type FilterDimension,
  type RangeField,
  type SelectorTable,
} from './NaverSelectors';
import { clickFirst } from './SelectorChain';
import { CrawlCancelledError } from './errors';
import { delay, ensureNotAborted, resolveTimings, type CrawlTimings } from './timing';

/**
 * Options selected per filter group, by visible label
 */
export type PanelSelection = Record<FilterDimension, readonly string[]>;

/**
 * What the filter panel has selected before anything is clicked
 */
export const SITE_DEFAULT_SELECTION: PanelSelection = {
  tradTpCd: ['매매', '전세'],
  rletTpCd: ['아파트', '아파트분양권', '재건축'],
};

/**
 * Pyeong buckets to the site's ㎡ option labels (1 pyeong = 3.305785 ㎡, bounds rounded)
 */
export const AREA_BUCKET_OPTIONS: Record<AreaBucket, string> = {
  [AreaBucket.UNDER_10]: '~ 33㎡',
  [AreaBucket.FROM_10]: '33~66㎡',
  [AreaBucket.FROM_20]: '66~99㎡',
  [AreaBucket.FROM_30]: '99~132㎡',
  [AreaBucket.FROM_40]: '132~165㎡',
  [AreaBucket.FROM_50]: '165~198㎡',
  [AreaBucket.FROM_60]: '198~231㎡',
  [AreaBucket.OVER_70]: '231㎡ ~',
};

export interface ToggleAction {
  dimension: FilterDimension;
  label: string;
  action: 'select' | 'deselect';
}

export interface RangeInputAction {
  field: RangeField;
  bound: 'min' | 'max';
  selector: string;
  value: string;
}

export interface FilterPlan {
  toggles: ToggleAction[];
  rangeInputs: RangeInputAction[];
  areaOption: string | null;
}

export interface FilterApplyReport {
  plan: FilterPlan;
  togglesApplied: number;
  rangeInputsApplied: number;
  areaOptionApplied: boolean;
  searchTriggered: boolean;
}

export interface SelectionDiff {
  deselect: string[];
  select: string[];
}

/**
 * Toggles needed to move a group from `current` to `requested`:
 * off for current − requested, on for requested − current, nothing for the overlap.
 */
export function diffSelection(current: readonly string[], requested: readonly string[]): SelectionDiff {
  const wanted = new Set(requested);
  const have = new Set(current);
  return {
    deselect: [...have].filter((label) => !wanted.has(label)),
    select: [...wanted].filter((label) => !have.has(label)),
  };
}

function rangeActions(field: RangeField, range: NumericRange | undefined): RangeInputAction[] {
  if (!range) {
    return [];
  }
  const ids = RANGE_INPUT_IDS[field];
  const actions: RangeInputAction[] = [];
  if (range.min !== undefined) {
    actions.push({ field, bound: 'min', selector: ids.min, value: String(range.min) });
  }
  if (range.max !== undefined) {
    actions.push({ field, bound: 'max', selector: ids.max, value: String(range.max) });
  }
  return actions;
}

/**
 * Computes the UI actions that turn the panel's `current` selection into `filter`
 */
export function planFilter(filter: SearchFilter, current: PanelSelection = SITE_DEFAULT_SELECTION): FilterPlan {
  const toggles: ToggleAction[] = [];
  const groups: Array<[FilterDimension, readonly string[]]> = [
    ['tradTpCd', filter.transactionTypes],
    ['rletTpCd', filter.buildingTypes],
  ];

  for (const [dimension, requested] of groups) {
    const diff = diffSelection(current[dimension], requested);
    for (const label of diff.deselect) {
      toggles.push({ dimension, label, action: 'deselect' });
    }
    for (const label of diff.select) {
      toggles.push({ dimension, label, action: 'select' });
    }
  }

  return {
    toggles,
    rangeInputs: [
      ...rangeActions('salePrice', filter.salePriceRange),
      ...rangeActions('deposit', filter.depositRange),
      ...rangeActions('monthlyRent', filter.monthlyRentRange),
    ],
    areaOption: filter.areaBucket ? AREA_BUCKET_OPTIONS[filter.areaBucket] : null,
  };
}

export interface FilterTranslatorOptions {
  timings?: Partial<CrawlTimings>;
  selectors?: SelectorTable;
  initialSelection?: PanelSelection;
}

/**
 * Drives the filter panel to match a SearchFilter.
 * Tracks the panel's selection so repeated application does not re-toggle.
 */
export class NaverFilterTranslator {
  private readonly logger: Logger;
  private readonly timings: CrawlTimings;
  private readonly selectors: SelectorTable;
  private selection: PanelSelection;

  constructor(logger: Logger, options: FilterTranslatorOptions = {}) {
    this.logger = logger;
    this.timings = resolveTimings(options.timings);
    this.selectors = options.selectors ?? NAVER_SELECTORS;
    this.selection = options.initialSelection ?? SITE_DEFAULT_SELECTION;
  }

  get currentSelection(): PanelSelection {
    return this.selection;
  }

  plan(filter: SearchFilter): FilterPlan {
    return planFilter(filter, this.selection);
  }

  /**
   * Applies the filter, then triggers the site's search.
   * Missing toggles, inputs, area tiles and apply buttons are recorded and skipped.
   */
  async apply(
    page: CrawlPage,
    filter: SearchFilter,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<FilterApplyReport> {
    const plan = this.plan(filter);
    this.logger.info('Applying search filter', {
      toggles: plan.toggles.length,
      rangeInputs: plan.rangeInputs.length,
      areaOption: plan.areaOption,
    });

    let togglesApplied = 0;
    for (const toggle of plan.toggles) {
      if (await this.applyToggle(page, toggle, diagnostics, signal)) {
        togglesApplied++;
      }
    }

    let rangeInputsApplied = 0;
    for (const input of plan.rangeInputs) {
      ensureNotAborted(signal);
      try {
        await page.locator(input.selector).fill(input.value, { timeout: this.timings.actionTimeoutMs });
        rangeInputsApplied++;
        this.logger.debug('Filled range input', { ...input });
        await delay(this.timings.toggleSettleMs, signal);
      } catch (error) {
        if (error instanceof CrawlCancelledError) {
          throw error;
        }
        diagnostics.record('range-input-failed', `Could not fill ${input.field} ${input.bound}`, {
          selector: input.selector,
          value: input.value,
          error: describeError(error),
        });
      }
    }

    const areaOptionApplied = plan.areaOption !== null
      ? await this.applyAreaOption(page, plan.areaOption, diagnostics, signal)
      : false;

    const searchTriggered = await this.triggerSearch(page, diagnostics, signal);

    return { plan, togglesApplied, rangeInputsApplied, areaOptionApplied, searchTriggered };
  }

  private async applyToggle(
    page: CrawlPage,
    toggle: ToggleAction,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<boolean> {
    ensureNotAborted(signal);
    const selector = filterToggleSelector(toggle.dimension, toggle.label);
    const context = { dimension: toggle.dimension, label: toggle.label, action: toggle.action };

    try {
      const label = page.locator(selector);
      if ((await label.count()) === 0) {
        diagnostics.record('filter-toggle-missing', `Filter option "${toggle.label}" not found`, context);
        return false;
      }

      await label.first().click({ timeout: this.timings.actionTimeoutMs });
    } catch (error) {
      if (error instanceof CrawlCancelledError) {
        throw error;
      }
      diagnostics.record('filter-toggle-failed', `Could not toggle filter option "${toggle.label}"`, {
        ...context,
        error: describeError(error),
      });
      return false;
    }

    this.recordToggle(toggle);
    this.logger.debug('Toggled filter option', context);
    await delay(this.timings.toggleSettleMs, signal);
    return true;
  }

  private recordToggle(toggle: ToggleAction): void {
    const current = this.selection[toggle.dimension];
    const next: PanelSelection = { ...this.selection };
    next[toggle.dimension] = toggle.action === 'select'
      ? [...current, toggle.label]
      : current.filter((label) => label !== toggle.label);
    this.selection = next;
  }

  private async applyAreaOption(
    page: CrawlPage,
    option: string,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<boolean> {
    const attempts: Array<{ selector: string; error: string }> = [];

    for (const candidate of this.selectors.areaOptionList) {
      ensureNotAborted(signal);
      try {
        await page
          .locator(candidate.selector)
          .getByRole('listitem')
          .filter({ hasText: option })
          .locator('label')
          .first()
          .click({ timeout: candidate.timeoutMs });
        this.logger.debug('Selected area option', { option, selector: candidate.selector });
        await delay(this.timings.toggleSettleMs, signal);
        return true;
      } catch (error) {
        if (error instanceof CrawlCancelledError) {
          throw error;
        }
        attempts.push({ selector: candidate.selector, error: describeError(error) });
      }
    }

    diagnostics.record('area-option-failed', `Could not select area option "${option}"`, { option, attempts });
    return false;
  }

  private async triggerSearch(
    page: CrawlPage,
    diagnostics: CrawlDiagnostics,
    signal?: AbortSignal
  ): Promise<boolean> {
    const clicked = await clickFirst(page, this.selectors.applyButton, signal);
    if (!clicked.ok) {
      diagnostics.record('apply-button-not-found', 'Search button not found; continuing with current filters', {
        attempts: clicked.error.attempts,
      });
    } else {
      this.logger.info('Triggered filtered search', { selector: clicked.value });
    }

    try {
      await page.waitForLoadState('networkidle', { timeout: this.timings.networkIdleTimeoutMs });
    } catch (error) {
      this.logger.debug('Network did not settle after filter search', { error: describeError(error) });
    }
    await delay(this.timings.applySettleMs, signal);

    return clicked.ok;
  }
}
