// Upper limits in pounds for the recorded weight classes

export interface WeightClass {
  name: string;
  limit: number;
}

export const WEIGHT_CLASSES: readonly WeightClass[] = [
  { name: "Women's Strawweight", limit: 115 },
  { name: "Women's Flyweight", limit: 125 },
  { name: "Women's Bantamweight", limit: 135 },
  { name: "Women's Featherweight", limit: 145 },
  { name: 'Strawweight', limit: 115 },
  { name: 'Flyweight', limit: 125 },
  { name: 'Bantamweight', limit: 135 },
  { name: 'Featherweight', limit: 145 },
  { name: 'Lightweight', limit: 155 },
  { name: 'Welterweight', limit: 170 },
  { name: 'Middleweight', limit: 185 },
  { name: 'Light Heavyweight', limit: 205 },
  { name: 'Heavyweight', limit: 265 },
];

// Distinct limits in ascending order; a class's step is its index here
const LADDER = [...new Set(WEIGHT_CLASSES.map(wc => wc.limit))].sort((a, b) => a - b);

function normalize(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ').replace(/ bout$/, '');
}

export function findWeightClass(name: string): WeightClass | undefined {
  const key = normalize(name);
  return WEIGHT_CLASSES.find(wc => normalize(wc.name) === key);
}

/** Position on the weight ladder; women's and men's classes share limits. */
export function weightClassStep(name: string): number | undefined {
  const wc = findWeightClass(name);
  return wc ? LADDER.indexOf(wc.limit) : undefined;
}
