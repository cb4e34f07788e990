/**
 * Exchange Directory
 *
 * Bidirectional lookup between the short exchange identifiers clients use
 * ("exchange1") and the canonical addresses the data service reports
 * ("exchange1:40101"). Built once at startup and read-only afterwards.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExchangeEntry {
  /** Short identifier, stored lower-case */
  id: string;
  /** Canonical address used by the data service */
  address: string;
}

export interface ExchangeDirectory {
  /** Canonical address for a short identifier (case-insensitive) */
  toAddress(id: string): string | undefined;
  /** Short identifier for a canonical address (exact match) */
  toShortId(address: string): string | undefined;
  entries(): readonly ExchangeEntry[];
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_EXCHANGES: readonly ExchangeEntry[] = Object.freeze([
  { id: "exchange1", address: "exchange1:40101" },
  { id: "exchange2", address: "exchange2:40102" },
  { id: "exchange3", address: "exchange3:40103" },
]);

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build a directory from its entries. Throws if an identifier or an
 * address appears twice, since lookups in either direction must be unique.
 */
export function createExchangeDirectory(source: Iterable<ExchangeEntry>): ExchangeDirectory {
  const byId = new Map<string, string>();
  const byAddress = new Map<string, string>();

  for (const { id: rawId, address } of source) {
    const id = rawId.toLowerCase();
    if (id === "" || address === "") {
      throw new Error("exchange entries need a non-empty id and address");
    }
    if (byId.has(id)) {
      throw new Error(`duplicate exchange id: ${id}`);
    }
    if (byAddress.has(address)) {
      throw new Error(`duplicate exchange address: ${address}`);
    }
    byId.set(id, address);
    byAddress.set(address, id);
  }

  const entries = Object.freeze(
    [...byId].map(([id, address]) => Object.freeze({ id, address })),
  );

  return Object.freeze({
    toAddress: (id: string) => byId.get(id.toLowerCase()),
    toShortId: (address: string) => byAddress.get(address),
    entries: () => entries,
  });
}

/**
 * Parse an `id=address` list separated by commas, e.g.
 * "exchange1=exchange1:40101,exchange2=exchange2:40102".
 */
export function parseExchangeList(raw: string): ExchangeEntry[] {
  return raw
    .split(",")
    .map((pair) => pair.trim())
    .filter((pair) => pair !== "")
    .map((pair) => {
      const separator = pair.indexOf("=");
      if (separator <= 0 || separator === pair.length - 1) {
        throw new Error(`malformed exchange entry "${pair}" (expected id=address)`);
      }
      return {
        id: pair.slice(0, separator).trim(),
        address: pair.slice(separator + 1).trim(),
      };
    });
}
