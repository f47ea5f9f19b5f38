import type { Region } from './types';

const NORTHEAST = new Set([
  'Connecticut',
  'Maine',
  'Massachusetts',
  'New Hampshire',
  'Rhode Island',
  'Vermont',
  'New York',
  'New Jersey',
  'Pennsylvania'
]);

const MIDWEST = new Set([
  'Illinois',
  'Indiana',
  'Michigan',
  'Ohio',
  'Wisconsin',
  'Iowa',
  'Kansas',
  'Minnesota',
  'Missouri',
  'Nebraska',
  'North Dakota',
  'South Dakota'
]);

const SOUTH = new Set([
  'Delaware',
  'Florida',
  'Georgia',
  'Maryland',
  'North Carolina',
  'South Carolina',
  'Virginia',
  'West Virginia',
  'Alabama',
  'Kentucky',
  'Mississippi',
  'Tennessee',
  'Arkansas',
  'Louisiana',
  'Oklahoma',
  'Texas'
]);

/** Anything not listed for the other three regions is West. */
export function classifyRegion(state: string): Region {
  if (NORTHEAST.has(state)) return 'Northeast';
  if (MIDWEST.has(state)) return 'Midwest';
  if (SOUTH.has(state)) return 'South';
  return 'West';
}
