import { clockCompare, getTimeComparator, lexicographicCompare, toMinutes } from '../../src/engine/timeComparator';

describe('timeComparator', () => {
    it('should order tokens as plain strings', () => {
        expect(lexicographicCompare('09:00', '10:00')).toBeLessThan(0);
        expect(lexicographicCompare('9:00', '10:00')).toBeGreaterThan(0);
        expect(lexicographicCompare('14:00', '14:00')).toBe(0);
    });

    it('should order H:MM tokens by clock time', () => {
        expect(clockCompare('9:00', '10:00')).toBeLessThan(0);
        expect(clockCompare('09:00', '9:00')).toBe(0);
    });

    it('should fall back to string order for unparsable tokens', () => {
        expect(clockCompare('noon', '9:00')).toBe(lexicographicCompare('noon', '9:00'));
    });

    it('should convert H:MM to minutes since midnight', () => {
        expect(toMinutes('13:45')).toBe(825);
        expect(toMinutes(' 7:05 ')).toBe(425);
        expect(toMinutes('7pm')).toBeNull();
    });

    it('should select comparators by name', () => {
        expect(getTimeComparator('lexicographic')).toBe(lexicographicCompare);
        expect(getTimeComparator('clock')).toBe(clockCompare);
    });
});
