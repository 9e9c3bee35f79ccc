import { SymbolTable, SymbolEntry, Type } from '../types';

export const GLOBAL_SCOPE = 0;

// Storage for a string binding is a pointer slot plus a length slot.
export function lengthLabel(storage: string): string {
  return `len${storage.slice(1)}`;
}

// Owns every symbol table of a program; blocks and tables refer to each other by index.
export class ScopeArena {
  public tables: SymbolTable[] = [];
  private bindings: Map<string, number> = new Map();

  constructor() {
    this.open(null);
  }

  public open(parent: number | null): number {
    const id = this.tables.length;
    this.tables.push(new SymbolTable(id, parent));
    return id;
  }

  public get(id: number): SymbolTable {
    const table = this.tables[id];
    if (!table) {
      throw new Error(`Unknown scope ${id}`);
    }
    return table;
  }

  public lookupLocal(scope: number, name: string): SymbolEntry | undefined {
    return this.get(scope).entries.get(name);
  }

  public lookup(scope: number, name: string): SymbolEntry | undefined {
    let current: number | null = scope;
    while (current !== null) {
      const table = this.get(current);
      const entry = table.entries.get(name);
      if (entry) return entry;
      current = table.parent;
    }
    return undefined;
  }

  // Adds a binding to the given table, masking any outer binding of the same name.
  public declare(scope: number, name: string, type: Type, shadowing: boolean): SymbolEntry {
    const entry = new SymbolEntry(name, type, shadowing, this.nextStorage(name));
    this.get(scope).entries.set(name, entry);
    return entry;
  }

  // Tables from the given scope out to the global one.
  public chain(scope: number): SymbolTable[] {
    const out: SymbolTable[] = [];
    let current: number | null = scope;
    while (current !== null) {
      const table = this.get(current);
      out.push(table);
      current = table.parent;
    }
    return out;
  }

  public allEntries(): SymbolEntry[] {
    return this.tables.flatMap(t => [...t.entries.values()]);
  }

  private nextStorage(name: string): string {
    const n = this.bindings.get(name) ?? 0;
    this.bindings.set(name, n + 1);
    return n === 0 ? `v_${name}` : `v${n}_${name}`;
  }
}
