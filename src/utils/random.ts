/**
 * Random sources for the simulator.
 * Every draw in a run goes through one injected RandomSource, so a seeded
 * source makes the whole run reproducible.
 */
export interface RandomSource {
    /** Uniform value in [0, 1). */
    next(): number;
}

/**
 * Linear congruential generator (Numerical Recipes constants).
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = Math.floor(Math.abs(seed)) % 4294967296;
    }

    public next(): number {
        this.state = (this.state * 1664525 + 1013904223) % 4294967296;
        return this.state / 4294967296;
    }
}

export const mathRandom: RandomSource = {
    next: () => Math.random()
};

export function createRandomSource(seed?: number): RandomSource {
    return seed === undefined ? mathRandom : new SeededRandom(seed);
}

export function uniform(random: RandomSource, min: number, max: number): number {
    return min + (max - min) * random.next();
}

// Inteiro em [min, max], inclusive
export function randomInt(random: RandomSource, min: number, max: number): number {
    return min + Math.floor(random.next() * (max - min + 1));
}

export function choice<T>(random: RandomSource, items: readonly T[]): T {
    if (items.length === 0) {
        throw new Error("Cannot choose from an empty list");
    }
    return items[Math.floor(random.next() * items.length)];
}

/**
 * Draws `count` distinct items (partial Fisher-Yates on a copy).
 */
export function sample<T>(random: RandomSource, items: readonly T[], count: number): T[] {
    if (count > items.length) {
        throw new Error(`Sample larger than population (${count} > ${items.length})`);
    }
    const pool = [...items];
    for (let i = 0; i < count; i++) {
        const j = i + Math.floor(random.next() * (pool.length - i));
        const tmp = pool[i];
        pool[i] = pool[j];
        pool[j] = tmp;
    }
    return pool.slice(0, count);
}
