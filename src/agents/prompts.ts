/**
 * Prompt builders for the research, planning and optimization agents
 */

import type { PlanningRequest } from '../models/itinerary.js';
import type { ResearchResult } from '../models/research.js';
import { DEFAULT_CURRENCY } from '../models/money.js';

export const PLANNER_SYSTEM_PROMPT =
  'You are an expert travel planner. Generate detailed, realistic travel itineraries in JSON format only. ' +
  'Include accurate cost estimates, specific hotels, transport and daily activities.';

export const OPTIMIZER_SYSTEM_PROMPT =
  'You are a budget optimization expert. Analyze travel itineraries and suggest cost-cutting measures while ' +
  'maintaining quality. Return JSON only with the optimized itinerary and the specific changes made.';

export const RESEARCH_SYSTEM_PROMPT =
  'You are a travel research assistant. Provide accurate, practical destination research as JSON only.';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function formatAmount(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

function longDate(isoDay: string): string {
  const date = new Date(`${isoDay.slice(0, 10)}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) return isoDay;
  return date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: '2-digit', timeZone: 'UTC' });
}

/**
 * Whole days between two YYYY-MM-DD dates, at least 1
 */
export function tripLengthDays(startDate: string, endDate: string): number {
  const start = Date.parse(`${startDate.slice(0, 10)}T00:00:00Z`);
  const end = Date.parse(`${endDate.slice(0, 10)}T00:00:00Z`);
  if (Number.isNaN(start) || Number.isNaN(end)) return 1;
  return Math.max(1, Math.round((end - start) / MS_PER_DAY));
}

export function buildResearchPrompt(planning: PlanningRequest): string {
  const { traveler, request } = planning;
  const currency = request.currency ?? DEFAULT_CURRENCY;
  const { budgetMin, budgetMax } = traveler.preferences;

  return `Research traveling to ${request.destination}.

Trip Details:
- Destination: ${request.destination}
- Travel Dates: ${request.startDate.slice(0, 10)} to ${request.endDate.slice(0, 10)}
- Home Location: ${traveler.homeLocation}
- Budget Range: ${currency} ${formatAmount(budgetMin)} to ${formatAmount(budgetMax)}
- Interests: ${traveler.preferences.interests.join(', ') || 'General sightseeing'}

Respond ONLY with valid JSON in this exact format:
{
  "weather_summary": "expected weather for the travel dates and what to pack",
  "accommodation_suggestions": "3-5 stays across price ranges with approximate costs",
  "top_attractions": "8-10 places and experiences with approximate costs and duration",
  "estimated_daily_cost": 5000,
  "currency": "${currency}",
  "travel_tips": "getting there from ${traveler.homeLocation}, local transport, safety, etiquette, food",
  "best_time_to_visit": "whether these dates are a good time and why"
}`;
}

export function buildPlanningPrompt(planning: PlanningRequest, research?: ResearchResult): string {
  const { traveler, request } = planning;
  const currency = request.currency ?? DEFAULT_CURRENCY;
  const { budgetMin, budgetMax, travelStyle, interests, dietaryRestrictions } = traveler.preferences;
  const days = tripLengthDays(request.startDate, request.endDate);
  const startLabel = longDate(request.startDate);
  const budget = `${currency} ${formatAmount(budgetMin)} - ${formatAmount(budgetMax)}`;

  const researchSection = research
    ? `**RESEARCH DATA:**

Weather Information:
${research.weatherSummary.slice(0, 500)}

Recommended Accommodations:
${research.accommodationSuggestions.slice(0, 500)}

Top Attractions:
${research.topAttractions.slice(0, 800)}

Estimated Daily Cost: ${currency} ${research.estimatedDailyCost ?? 'unknown'}

Travel Tips:
${research.travelTips.slice(0, 500)}

`
    : '';

  return `Create a detailed ${days}-day travel itinerary for the following trip:

**TRAVELER PROFILE:**
- Name: ${traveler.name}
- Home Location: ${traveler.homeLocation}
- Budget: ${budget}
- Travel Style: ${travelStyle}
- Interests: ${interests.join(', ') || 'None specified'}
- Dietary Restrictions: ${dietaryRestrictions.join(', ') || 'None'}

**TRIP DETAILS:**
- Destination: ${request.destination}
- Start Date: ${startLabel}
- End Date: ${longDate(request.endDate)}
- Duration: ${days} days

${researchSection}**TASK:**
Create a day-by-day itinerary with 3-5 activities per day (time slot such as "9:00 AM - 11:00 AM", name,
description, location, estimated cost in ${currency}, transportation), one recommended stay, the way to get
from ${traveler.homeLocation} to ${request.destination}, and a cost breakdown whose total stays within ${budget}.

Return ONLY valid JSON in this exact structure:
{
  "destination": "${request.destination}",
  "duration_days": ${days},
  "accommodation": {
    "name": "Hotel Name",
    "cost_per_night": 3500,
    "total_nights": ${Math.max(days - 1, 1)},
    "total_cost": 31500,
    "recommendation": "Why this stay suits the traveler"
  },
  "daily_schedule": [
    {
      "day": 1,
      "date": "${startLabel}",
      "activities": [
        {
          "time": "9:00 AM - 11:00 AM",
          "name": "Activity Name",
          "description": "What you'll do",
          "location": "Specific location",
          "cost": 500,
          "transportation": "Auto-rickshaw"
        }
      ]
    }
  ],
  "transportation": {
    "to_destination": { "method": "Train/Flight/Bus", "cost": 2500, "duration": "3 hours" }
  },
  "cost_breakdown": {
    "accommodation": 31500,
    "activities": 8000,
    "food": 12000,
    "transportation": 5000,
    "miscellaneous": 3500,
    "total": 60000,
    "currency": "${currency}"
  },
  "special_notes": "Important tips and reminders"
}

Return ONLY the JSON, no markdown formatting, no explanations.`;
}

export function buildOptimizationPrompt(
  plan: Record<string, unknown>,
  budgetMax: number,
  currentTotal: number,
  currency: string
): string {
  return `Analyze this travel itinerary and optimize it to reduce costs while maintaining quality.

**CURRENT ITINERARY:**
${JSON.stringify(plan, null, 2)}

**CONSTRAINTS:**
- Maximum Budget: ${currency} ${formatAmount(budgetMax)}
- Current Total: ${currency} ${formatAmount(currentTotal)}
- Budget Status: ${currentTotal > budgetMax ? 'OVER BUDGET' : 'Within budget'}

**OPTIMIZATION TASKS:**
1. If over budget: cheaper stays of good quality, free or low-cost activities, public transport.
2. Group nearby attractions on the same day and order activities to shorten travel.
3. Add free viewpoints, local experiences and money-saving tips.

Return the OPTIMIZED itinerary in the SAME JSON structure, with updated costs, a new "cost_breakdown"
with the reduced total, and the changes listed as strings in "optimization_applied".

Return ONLY valid JSON, no explanations.`;
}
