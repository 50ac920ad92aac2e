import { createHash } from "node:crypto";

/**
 * Identity of a physical listing: the same name, price and product URL always give the
 * same key, whichever adapter saw the card.
 */
export function identityKey(name: string, price: number, productUrl?: string): string {
  const material = [name.trim().replace(/\s+/g, " ").toLowerCase(), price.toFixed(2), productUrl ?? ""].join("|");
  return createHash("sha1").update(material).digest("hex");
}

/** Per-run memory of identities already emitted. */
export class SeenSet {
  private readonly keys = new Set<string>();

  /** Returns true the first time a key is offered, false on every repeat. */
  admit(key: string): boolean {
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  get size(): number {
    return this.keys.size;
  }
}
