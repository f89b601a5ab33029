/**
 * Adaptive difficulty selection.
 *
 * Strong candidates are steered to harder tasks. Bands overlap at their
 * edges.
 */

export interface DifficultyBand {
  min: number;
  max: number;
}

export function difficultyBand(score: number): DifficultyBand {
  if (score >= 0.8) return { min: 6, max: 10 };
  if (score >= 0.5) return { min: 4, max: 7 };
  return { min: 1, max: 4 };
}

export function inBand(difficulty: number, band: DifficultyBand): boolean {
  return difficulty >= band.min && difficulty <= band.max;
}

export function pickRandom<T>(items: T[], random: () => number = Math.random): T | null {
  if (items.length === 0) return null;
  return items[Math.floor(random() * items.length)] ?? null;
}
