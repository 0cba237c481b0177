import { InvalidArgumentError } from 'commander';

/**
 * Option parser for whole numbers no smaller than `minimum`
 */
export function integerOption(minimum: number): (value: string) => number {
    return (value: string) => {
        const parsed = /^\d+$/.test(value.trim()) ? Number(value) : Number.NaN;
        if (!Number.isSafeInteger(parsed) || parsed < minimum) {
            throw new InvalidArgumentError(`Expected a whole number >= ${minimum}.`);
        }
        return parsed;
    };
}
