/**
 * Duration expression parsing.
 *
 * Accepts a signed sequence of decimal numbers, each with a unit suffix:
 * "300ms", "-1.5h", "2h45m", "1m30.5s". Valid units are "ns", "us" (or
 * "µs"), "ms", "s", "m" and "h". A bare "0" is also accepted.
 */

const UNIT_NS: Record<string, bigint> = {
  ns: 1n,
  us: 1_000n,
  "µs": 1_000n, // micro sign
  "μs": 1_000n, // greek mu
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
};

const NS_PER_MS = 1_000_000n;

// Durations are signed 64-bit nanosecond counts
const MAX_NS = 2n ** 63n - 1n;

// "ms" must be tried before "m", and "ns"/"us" before "s"
const COMPONENT = /(\d*)(?:\.(\d*))?(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * Parse a duration expression into whole nanoseconds. Fractions below one
 * nanosecond are truncated, so "0.5ns" is zero.
 *
 * @returns null when the expression is malformed or outside the signed
 * 64-bit nanosecond range
 */
export function parseDurationNs(input: string): bigint | null {
  let rest = input;
  let negative = false;

  if (rest.startsWith("-") || rest.startsWith("+")) {
    negative = rest.startsWith("-");
    rest = rest.slice(1);
  }

  if (rest === "0") return 0n;
  if (rest === "") return null;

  const limit = negative ? MAX_NS + 1n : MAX_NS;
  let total = 0n;
  let position = 0;
  while (position < rest.length) {
    COMPONENT.lastIndex = position;
    const match = COMPONENT.exec(rest);
    if (!match) return null;

    const [, whole, fraction = "", unit] = match;
    if (whole === "" && fraction === "") return null;

    const size = UNIT_NS[unit];
    total += BigInt(whole || "0") * size;
    if (fraction !== "") {
      total += (BigInt(fraction) * size) / 10n ** BigInt(fraction.length);
    }
    if (total > limit) return null;

    position = COMPONENT.lastIndex;
  }

  return negative ? -total : total;
}

/**
 * Parse a duration expression into milliseconds.
 *
 * @returns the duration in milliseconds (possibly fractional or negative),
 * or null when the expression is malformed or out of range
 *
 * @example
 * parseDuration("5m")     // 300000
 * parseDuration("1h30m")  // 5400000
 * parseDuration("abc")    // null
 */
export function parseDuration(input: string): number | null {
  const ns = parseDurationNs(input);
  if (ns === null) return null;
  if (ns === 0n) return 0;
  return Number(ns / NS_PER_MS) + Number(ns % NS_PER_MS) / 1e6;
}

/**
 * Render milliseconds back into a compact duration expression, largest
 * units first ("1h30m", "45s", "250ms").
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";

  const sign = ms < 0 ? "-" : "";
  let remaining = Math.abs(ms);
  let out = "";

  for (const [unit, size] of [["h", 3_600_000], ["m", 60_000], ["s", 1_000]] as const) {
    const count = Math.floor(remaining / size);
    if (count > 0) {
      out += `${count}${unit}`;
      remaining -= count * size;
    }
  }
  if (remaining > 0) out += `${remaining}ms`;

  return sign + out;
}
