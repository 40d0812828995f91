import { startsWith, toHex } from './binary/buffer.js';
import { RegistryConflictError } from './errors.js';
import type { HeaderEntry } from './types.js';

/**
 * Bidirectional magic-bytes ↔ label table built from one ordered entry list.
 *
 * Forward lookups scan entries in declaration order and return the first
 * header that prefixes the data. The reverse map is derived at construction,
 * and a repeated header or label is rejected there.
 */
export class HeaderRegistry<L extends string> {
  private readonly _entries: readonly HeaderEntry<L>[];
  private readonly _byLabel = new Map<string, Uint8Array>();
  public readonly maxHeaderLength: number;

  constructor(entries: readonly HeaderEntry<L>[]) {
    const seenHeaders = new Set<string>();
    const copies: HeaderEntry<L>[] = [];

    for (const { header, label } of entries) {
      const key = toHex(header);
      if (seenHeaders.has(key)) {
        throw new RegistryConflictError('header', key);
      }
      if (this._byLabel.has(label)) {
        throw new RegistryConflictError('label', label);
      }
      seenHeaders.add(key);

      const owned = header.slice();
      this._byLabel.set(label, owned);
      copies.push({ header: owned, label });
    }

    this._entries = copies;
    this.maxHeaderLength = copies.reduce((max, e) => Math.max(max, e.header.length), 0);
  }

  /**
   * Label of the first entry whose header prefixes `data`
   */
  identify(data: Uint8Array): L | undefined {
    for (const { header, label } of this._entries) {
      if (startsWith(data, header)) {
        return label;
      }
    }
    return undefined;
  }

  /**
   * Header for `label`; one leading '.' is ignored so file extensions work too
   */
  headerFor(label: string): Uint8Array | undefined {
    const key = label.startsWith('.') ? label.slice(1) : label;
    return this._byLabel.get(key)?.slice();
  }

  /**
   * Narrow an arbitrary string to a registered label
   */
  has(label: string): label is L {
    return this._byLabel.has(label);
  }

  get labels(): L[] {
    return this._entries.map(e => e.label);
  }

  get entries(): HeaderEntry<L>[] {
    return this._entries.map(e => ({ header: e.header.slice(), label: e.label }));
  }
}
