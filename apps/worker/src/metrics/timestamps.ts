/**
 * Server timestamp parsing.
 *
 * Brokers send either RFC 3339 with up to nanosecond precision
 * ("2024-05-01T12:00:00.123456789Z") or UNIX seconds as a decimal string
 * ("1714564800.123456789"). Date.parse() only takes milliseconds, so the
 * fraction is read by hand. Result is epoch milliseconds, possibly fractional.
 */

const RFC3339 =
    /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const UNIX_SECONDS = /^\d+(?:\.\d+)?$/;

export function parseServerTime(value: string | null | undefined): number | null {
    if (value === null || value === undefined) return null;
    const raw = value.trim();
    if (raw.length === 0) return null;

    if (UNIX_SECONDS.test(raw)) {
        const seconds = Number(raw);
        return Number.isFinite(seconds) ? seconds * 1000 : null;
    }

    const match = RFC3339.exec(raw);
    if (!match) return null;

    const [, year, month, day, hour, minute, second, fraction, zulu, sign, offsetHours, offsetMinutes] = match;
    const wholeMs = Date.UTC(
        Number(year),
        Number(month) - 1,
        Number(day),
        Number(hour),
        Number(minute),
        Number(second)
    );
    if (Number.isNaN(wholeMs)) return null;

    // Date.UTC rolls invalid fields over (Feb 30 -> Mar 2); reject those
    const check = new Date(wholeMs);
    if (check.getUTCMonth() !== Number(month) - 1 || check.getUTCDate() !== Number(day)) {
        return null;
    }

    const fractionMs = fraction ? Number(`0.${fraction}`) * 1000 : 0;

    let offsetMs = 0;
    if (!zulu && sign) {
        const minutes = Number(offsetHours) * 60 + Number(offsetMinutes);
        offsetMs = (sign === "+" ? 1 : -1) * minutes * 60_000;
    }

    return wholeMs + fractionMs - offsetMs;
}
