/**
 * The set of currently selected panel ids.
 *
 * Shared by PanelRegistry (which drops deleted panels from it) and the
 * interaction controller (which edits it on pointer gestures).
 */

export type SelectionListener = (selected: string[]) => void;

export class Selection {
  private ids = new Set<string>();
  private listeners = new Set<SelectionListener>();

  /* -- Queries ------------------------------------------------------------ */

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  /** Selected ids in selection order. */
  toArray(): string[] {
    return Array.from(this.ids);
  }

  /** The id when exactly one panel is selected. */
  single(): string | undefined {
    if (this.ids.size !== 1) return undefined;
    return this.ids.values().next().value;
  }

  /* -- Mutations ---------------------------------------------------------- */

  replace(ids: Iterable<string>): void {
    const next = new Set(ids);
    if (sameMembers(next, this.ids)) return;
    this.ids = next;
    this.emit();
  }

  add(ids: Iterable<string>): void {
    const before = this.ids.size;
    for (const id of ids) this.ids.add(id);
    if (this.ids.size !== before) this.emit();
  }

  remove(id: string): void {
    if (this.ids.delete(id)) this.emit();
  }

  clear(): void {
    if (this.ids.size === 0) return;
    this.ids.clear();
    this.emit();
  }

  /* -- Subscription ------------------------------------------------------- */

  subscribe(listener: SelectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    const snapshot = this.toArray();
    for (const listener of this.listeners) listener(snapshot);
  }
}

function sameMembers(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const id of a) if (!b.has(id)) return false;
  return true;
}
