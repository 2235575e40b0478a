/**
 * Domain Models
 * Traveler, offers, itinerary and the plan payload exchanged between agents
 */

import { z } from 'zod';
import { DEFAULT_CURRENCY, toMinorUnits, type Money } from './money.js';

// ============================================================================
// Traveler & Request
// ============================================================================

export const TravelerPreferencesSchema = z.object({
  budgetMin: z.number().nonnegative().default(500),
  budgetMax: z.number().nonnegative().default(2000),
  travelStyle: z.enum(['budget', 'balanced', 'luxury']).default('balanced'),
  interests: z.array(z.string()).default([]),
  accessibilityNeeds: z.array(z.string()).default([]),
  dietaryRestrictions: z.array(z.string()).default([]),
});

export const TravelerProfileSchema = z.object({
  travelerId: z.string().min(1),
  name: z.string().min(1).default('Anonymous'),
  email: z.string().email().optional(),
  homeLocation: z.string().default('Unknown'),
  preferences: TravelerPreferencesSchema.default({}),
  loyaltyPrograms: z.record(z.string()).default({}),
});

const DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

export const TripRequestSchema = z.object({
  destination: z.string().min(1),
  startDate: z.string().regex(DATE_PREFIX, 'expected YYYY-MM-DD'),
  endDate: z.string().regex(DATE_PREFIX, 'expected YYYY-MM-DD'),
  currency: z.string().length(3).optional(),
});

export const PlanningRequestSchema = z.object({
  traveler: TravelerProfileSchema,
  request: TripRequestSchema,
});

export type TravelerPreferences = z.infer<typeof TravelerPreferencesSchema>;
export type TravelerProfile = z.infer<typeof TravelerProfileSchema>;
export type TripRequest = z.infer<typeof TripRequestSchema>;
export type PlanningRequest = z.infer<typeof PlanningRequestSchema>;

// ============================================================================
// Offers
// ============================================================================

export type OfferType = 'flight' | 'hotel' | 'activity' | 'transport' | 'package';

export interface Location {
  name: string;
  city: string;
  country: string;
}

export interface Pricing {
  basePrice: Money;
  taxes: Money;
  fees: Money;
  total: Money;
}

export interface Offer {
  offerId: string;
  offerType: OfferType;
  provider: string;
  title: string;
  description?: string;
  pricing: Pricing;
  startTime?: string;
  endTime?: string;
  location?: Location;
  rating?: number;
  amenities: string[];
}

const MoneySchema = z.object({
  minor: z.number().int(),
  currency: z.string(),
});

// Offers come back from an LLM, so amounts may be Money, a number or a string
const AmountSchema = z.union([MoneySchema, z.number(), z.string()]);

const LocationSchema = z.object({
  name: z.string().default(''),
  city: z.string().default(''),
  country: z.string().default(''),
});

function toMoney(amount: z.infer<typeof AmountSchema> | undefined, currency: string): Money | undefined {
  if (amount === undefined) return undefined;
  if (typeof amount === 'object') return amount;
  const minor = toMinorUnits(amount);
  return minor === undefined ? undefined : { minor, currency };
}

const PricingSchema = z
  .object({
    basePrice: AmountSchema.optional(),
    taxes: AmountSchema.optional(),
    fees: AmountSchema.optional(),
    total: AmountSchema,
    currency: z.string().optional(),
  })
  .transform((raw, ctx): Pricing => {
    const currency =
      raw.currency ?? (typeof raw.total === 'object' ? raw.total.currency : DEFAULT_CURRENCY);
    const total = toMoney(raw.total, currency);
    if (!total) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'total is not a decimal amount' });
      return z.NEVER;
    }
    const zeroed: Money = { minor: 0, currency: total.currency };
    return {
      basePrice: toMoney(raw.basePrice, currency) ?? total,
      taxes: toMoney(raw.taxes, currency) ?? zeroed,
      fees: toMoney(raw.fees, currency) ?? zeroed,
      total,
    };
  });

export const OfferSchema = z.object({
  offerId: z.string(),
  offerType: z.enum(['flight', 'hotel', 'activity', 'transport', 'package']),
  provider: z.string(),
  title: z.string(),
  description: z.string().optional(),
  pricing: PricingSchema,
  startTime: z.string().optional(),
  endTime: z.string().optional(),
  location: LocationSchema.optional(),
  rating: z.number().min(0).max(5).optional(),
  amenities: z.array(z.string()).default([]),
});

// ============================================================================
// Plan payload (proposal / optimized_plan)
// ============================================================================

export const ScheduledActivitySchema = z.object({
  time: z.string().default(''),
  name: z.string().default('Activity'),
  description: z.string().default(''),
  location: z.string().optional(),
  cost: z.union([z.number(), z.string()]).default(0),
});

export const DayScheduleSchema = z.object({
  day: z.number().int().positive().default(1),
  activities: z.array(z.unknown()).default([]),
});

// null and unusable values mean "not given"; the total then comes from the segments
export const CostBreakdownSchema = z
  .object({
    total: z.union([z.number(), z.string()]).nullish().catch(undefined),
    currency: z.string().nullish().catch(undefined),
  })
  .passthrough();

const entries = z
  .array(z.unknown())
  .nullish()
  .transform((value) => value ?? []);

/**
 * Lenient view of a plan payload. Arrays are kept as unknown so each entry can
 * be validated (and, for activities, skipped) on its own during assembly.
 * Fields assembly never reads pass through unchecked.
 */
export const PlanPayloadSchema = z
  .object({
    flights: entries,
    hotels: entries,
    activities: entries,
    daily_schedule: entries,
    cost_breakdown: CostBreakdownSchema.optional().catch(undefined),
    optimization_applied: z.array(z.string()).default([]).catch([]),
  })
  .passthrough();

export type ScheduledActivity = z.infer<typeof ScheduledActivitySchema>;
export type PlanPayload = z.infer<typeof PlanPayloadSchema>;

export const EMPTY_PLAN = { flights: [], hotels: [], activities: [] } as const;

// ============================================================================
// Itinerary
// ============================================================================

export interface ItinerarySegment {
  segmentId: string;
  day: number;
  startTime: string;
  endTime: string;
  segmentType: OfferType;
  title: string;
  description: string;
  location: Location;
  offer?: Offer;
  order: number;
}

export interface Itinerary {
  itineraryId: string;
  traveler: TravelerProfile;
  destination: string;
  startDate: string;
  endDate: string;
  segments: ItinerarySegment[];
  totalCost: Pricing;
  optimizationNotes?: string;
  createdAt: string;
}
