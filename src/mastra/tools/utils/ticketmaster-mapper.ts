import { TIME_TBD, type EventRecord } from '../../../types/index.js';
import type { TicketmasterEvent } from './ticketmaster-types.js';
import { parseIsoDate } from './date-range.js';

export const OUTDOOR_KEYWORDS = ['stadium', 'park', 'amphitheater', 'field', 'grounds', 'pavilion'] as const;

// Friday, Saturday, Sunday (Date#getUTCDay numbering)
const WEEKEND_DAYS = new Set([5, 6, 0]);

export function isWeekend(date: string): boolean {
  const d = parseIsoDate(date);
  return d !== null && WEEKEND_DAYS.has(d.getUTCDay());
}

export function isOutdoor(venueName: string): boolean {
  const lower = venueName.toLowerCase();
  return OUTDOOR_KEYWORDS.some((kw) => lower.includes(kw));
}

function toNumber(value: string | number | undefined): number {
  const n = typeof value === 'number' ? value : parseFloat(value ?? '');
  return Number.isFinite(n) ? n : 0;
}

export function normalizeEvent(raw: TicketmasterEvent): EventRecord {
  const venue = raw._embedded?.venues?.[0];
  const venueName = venue?.name ?? '';
  const priceRange = raw.priceRanges?.[0];
  const classification = raw.classifications?.[0];
  const start = raw.dates?.start;
  const date = start?.localDate ?? '';

  return {
    id: raw.id ?? '',
    name: raw.name ?? '',
    description: raw.description || raw.info || raw.pleaseNote || '',
    date,
    time: start?.localTime ?? TIME_TBD,
    venue: {
      name: venueName,
      address: venue?.address?.line1 ?? '',
      city: venue?.city?.name ?? '',
      region: venue?.state?.stateCode ?? '',
      lat: toNumber(venue?.location?.latitude),
      lng: toNumber(venue?.location?.longitude),
    },
    price: {
      min: toNumber(priceRange?.min),
      max: toNumber(priceRange?.max),
    },
    category: classification?.segment?.name ?? '',
    genre: classification?.genre?.name ?? '',
    ticketUrl: raw.url ?? '',
    imageUrl: raw.images?.[0]?.url ?? '',
    isWeekend: isWeekend(date),
    isOutdoor: isOutdoor(venueName),
  };
}
