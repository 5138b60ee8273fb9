// src/engine/timeComparator.ts

/**
 * Comparator over time tokens: negative if a < b, 0 if equal, positive if a > b
 */
export type TimeComparator = (a: string, b: string) => number;

export type TimeComparatorName = 'lexicographic' | 'clock';

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Plain string comparison. "9:00" sorts after "10:00".
 */
export const lexicographicCompare: TimeComparator = (a, b) => {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
};

/**
 * Minutes since midnight for H:MM / HH:MM tokens, null otherwise
 */
export function toMinutes(token: string): number | null {
    const match = CLOCK_PATTERN.exec(token.trim());
    if (!match) {
        return null;
    }
    return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Clock-aware comparison. Falls back to string comparison when either
 * token is not H:MM.
 */
export const clockCompare: TimeComparator = (a, b) => {
    const minutesA = toMinutes(a);
    const minutesB = toMinutes(b);
    if (minutesA === null || minutesB === null) {
        return lexicographicCompare(a, b);
    }
    return minutesA - minutesB;
};

export function getTimeComparator(name: TimeComparatorName): TimeComparator {
    switch (name) {
        case 'lexicographic':
            return lexicographicCompare;
        case 'clock':
            return clockCompare;
    }
}
