/**
 * Itinerary assembly from an optimized (or fallback) plan payload
 */

import { randomUUID } from 'crypto';
import { ResponseParseError } from '../types/index.js';
import {
  DayScheduleSchema,
  OfferSchema,
  PlanPayloadSchema,
  ScheduledActivitySchema,
  type Itinerary,
  type ItinerarySegment,
  type Location,
  type Offer,
  type PlanPayload,
} from '../models/itinerary.js';
import { DEFAULT_CURRENCY, money, splitTotal, toMinorUnits, type Money } from '../models/money.js';
import type { Logger } from '../logging/logger.js';
import type { TaskContext } from './task-context.js';
import { addDays, parseTimeRange } from './time-range.js';

const ACTIVITY_RATING = 4.5;

export interface AssemblyOptions {
  logger: Logger;
  now?: () => Date;
}

function shortId(prefix: string): string {
  return `${prefix}-${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

/**
 * Trip dates as wall-clock timestamps; a bare date means midnight
 */
function wallClock(date: string): string {
  return /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/.test(date) ? date.slice(0, 19) : `${date.slice(0, 10)}T00:00:00`;
}

function parseOffers(entries: unknown[], kind: 'flight' | 'hotel'): Offer[] {
  return entries.map((entry, index) => {
    const parsed = OfferSchema.safeParse(entry);
    if (!parsed.success) {
      throw new ResponseParseError(`Malformed ${kind} offer at index ${index}`, parsed.error);
    }
    return parsed.data;
  });
}

/**
 * Breakdown total when present and non-zero, otherwise the sum of segment
 * offers in the first offer's currency
 */
function totalCost(plan: PlanPayload, segments: ItinerarySegment[], logger: Logger): Money {
  const breakdown = plan.cost_breakdown;
  const declared = toMinorUnits(breakdown?.total);
  if (declared !== undefined && declared !== 0) {
    return { minor: declared, currency: breakdown?.currency ?? DEFAULT_CURRENCY };
  }

  const offers = segments.flatMap((segment) => (segment.offer ? [segment.offer] : []));
  const currency = offers.length > 0 ? offers[0].pricing.total.currency : DEFAULT_CURRENCY;
  let minor = 0;
  for (const offer of offers) {
    if (offer.pricing.total.currency !== currency) {
      logger.warn({ offerId: offer.offerId, currency: offer.pricing.total.currency }, `Skipping offer not priced in ${currency}`);
      continue;
    }
    minor += offer.pricing.total.minor;
  }
  return { minor, currency };
}

/**
 * Build the final itinerary. Malformed flight or hotel offers throw
 * ResponseParseError; a malformed activity is skipped.
 */
export function assembleItinerary(context: TaskContext, payload: unknown, options: AssemblyOptions): Itinerary {
  const { logger } = options;
  const now = options.now ?? (() => new Date());
  const { traveler, request } = context.request;
  const destination = request.destination;

  const parsedPlan = PlanPayloadSchema.safeParse(payload);
  if (!parsedPlan.success) {
    throw new ResponseParseError('Plan payload has an unexpected shape', parsedPlan.error);
  }
  const plan = parsedPlan.data;

  const tripStart = wallClock(request.startDate);
  const tripEnd = wallClock(request.endDate);
  const fallbackLocation: Location = { name: destination, city: destination, country: '' };
  const activityCurrency =
    typeof plan.currency === 'string' ? plan.currency : plan.cost_breakdown?.currency ?? DEFAULT_CURRENCY;

  const segments: ItinerarySegment[] = [];
  const push = (segment: Omit<ItinerarySegment, 'segmentId' | 'order'>) => {
    segments.push({ segmentId: shortId('seg'), order: segments.length, ...segment });
  };

  for (const flight of parseOffers(plan.flights, 'flight')) {
    push({
      day: 1,
      startTime: flight.startTime ?? tripStart,
      endTime: flight.endTime ?? tripStart,
      segmentType: 'flight',
      title: flight.title,
      description: flight.description ?? '',
      location: flight.location ?? fallbackLocation,
      offer: flight,
    });
  }

  for (const hotel of parseOffers(plan.hotels, 'hotel')) {
    push({
      day: 1,
      startTime: tripStart,
      endTime: tripEnd,
      segmentType: 'hotel',
      title: hotel.title,
      description: hotel.description ?? '',
      location: hotel.location ?? fallbackLocation,
      offer: hotel,
    });
  }

  plan.daily_schedule.forEach((entry, dayIndex) => {
    const parsedDay = DayScheduleSchema.safeParse(entry);
    if (!parsedDay.success) {
      logger.warn({ dayIndex, issues: parsedDay.error.issues.length }, 'Skipping malformed schedule day');
      return;
    }
    const { day, activities } = parsedDay.data;
    const date = addDays(request.startDate.slice(0, 10), day - 1);

    activities.forEach((raw, activityIndex) => {
      const parsed = ScheduledActivitySchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn({ day, activityIndex }, 'Failed to create activity segment');
        return;
      }
      const activity = parsed.data;
      const { start, end } = parseTimeRange(activity.time, date);
      const location: Location = { name: activity.location ?? destination, city: destination, country: '' };
      const cost = money(activity.cost, activityCurrency);

      push({
        day,
        startTime: start,
        endTime: end,
        segmentType: 'activity',
        title: activity.name,
        description: activity.description,
        location,
        offer: {
          offerId: shortId('activity'),
          offerType: 'activity',
          provider: activity.location ?? 'Local',
          title: activity.name,
          description: activity.description,
          pricing: { basePrice: cost, taxes: money(0, cost.currency), fees: money(0, cost.currency), total: cost },
          location,
          rating: ACTIVITY_RATING,
          amenities: [],
        },
      });
    });
  });

  const total = totalCost(plan, segments, logger);

  return {
    itineraryId: shortId('itin'),
    traveler,
    destination,
    startDate: request.startDate,
    endDate: request.endDate,
    segments,
    totalCost: splitTotal(total),
    ...(plan.optimization_applied.length > 0 && { optimizationNotes: plan.optimization_applied.join('\n') }),
    createdAt: now().toISOString(),
  };
}
