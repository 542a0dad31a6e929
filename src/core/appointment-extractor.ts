/**
 * Appointment Extractor
 *
 * Drives the results view's filter controls and parses slot elements into
 * AppointmentSlot records. Only well-formed slots are ever returned.
 */

import type { AppointmentSlot, FilterSpec } from '../types/index.js';
import { isCalendarDate, isTimeOfDay } from '../utils/dates.js';
import { NavigationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ResultsView } from './authenticated-session.js';
import type { AttributeRecord } from './page-driver.js';
import { centerOptionSelector, type SiteProfile } from './site-profile.js';

const log = logger.extractor;

const UNKNOWN = 'unknown';

/**
 * A filter control that could not be applied
 */
export interface SkippedFilter {
  filter: string;
  reason: string;
}

/**
 * What the poll scheduler needs from an extractor
 */
export interface SlotExtractor {
  applyFilters(view: ResultsView, spec: FilterSpec): Promise<SkippedFilter[]>;
  parseResults(view: ResultsView, spec: FilterSpec): Promise<AppointmentSlot[]>;
}

export class AppointmentExtractor implements SlotExtractor {
  constructor(private site: SiteProfile) {}

  /**
   * Apply every requested centre and the date range. A failing sub-filter is
   * logged and skipped; partial filtering still yields a usable result set.
   */
  async applyFilters(view: ResultsView, spec: FilterSpec): Promise<SkippedFilter[]> {
    const skipped: SkippedFilter[] = [];
    const { selectors } = this.site;

    const attempt = async (filter: string, action: () => Promise<void>): Promise<void> => {
      try {
        await action();
      } catch (error) {
        if (!(error instanceof NavigationError)) {
          throw error;
        }
        const reason = errorMessage(error);
        skipped.push({ filter, reason });
        log.warn('Filter skipped', { filter, reason });
      }
    };

    for (const center of spec.centers) {
      await attempt(`center:${center}`, () => view.click(centerOptionSelector(this.site, center)));
    }

    const range = spec.dateRange;
    if (range) {
      await attempt('date:from', () => view.fill(selectors.dateFrom, range.start));
      await attempt('date:to', () => view.fill(selectors.dateTo, range.end));
    }

    await attempt('search', () => view.click(selectors.search));

    return skipped;
  }

  /**
   * Parse all slot elements in the current view. Returns [] when there are none.
   * A slot without a centre belongs to the requested centre when only one was
   * selected; otherwise it is kept as `unknown` and will not match the filter.
   *
   * @throws NavigationError when the view cannot be read
   */
  async parseResults(view: ResultsView, spec: FilterSpec): Promise<AppointmentSlot[]> {
    const attributes = this.site.slotAttributes;
    const records = await view.extract({
      selector: this.site.selectors.slot,
      attributes: [
        attributes.date,
        attributes.time,
        attributes.center,
        attributes.testType,
        attributes.bookingUrl,
      ],
    });

    const defaultCenter = spec.centers.length === 1 ? spec.centers[0] : undefined;
    const slots: AppointmentSlot[] = [];
    for (const record of records) {
      const slot = this.toSlot(record, defaultCenter);
      if (slot) {
        slots.push(slot);
      }
    }

    if (slots.length < records.length) {
      log.debug('Dropped malformed slots', { dropped: records.length - slots.length });
    }
    const unplaced = slots.filter((slot) => slot.center === UNKNOWN).length;
    if (unplaced > 0) {
      log.info('Slots without a centre cannot match the filter', { unplaced, centers: spec.centers });
    }
    return slots;
  }

  private toSlot(record: AttributeRecord, defaultCenter: string | undefined): AppointmentSlot | null {
    const attributes = this.site.slotAttributes;
    const date = record[attributes.date]?.trim();
    const time = record[attributes.time]?.trim();
    if (!date || !time || !isCalendarDate(date) || !isTimeOfDay(time)) {
      return null;
    }

    const bookingUrl = record[attributes.bookingUrl]?.trim();
    return Object.freeze({
      center: record[attributes.center]?.trim().toLowerCase() || defaultCenter || UNKNOWN,
      date,
      time,
      testType: record[attributes.testType]?.trim().toLowerCase() || UNKNOWN,
      ...(bookingUrl ? { bookingUrl } : {}),
    });
  }
}
