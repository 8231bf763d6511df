import { LookupError } from "../errors.js";

/**
 * A node of the configuration tree.
 *
 * Values and children are kept twice: a map for lookup and an ordered list of
 * names for export. Both are append-only; `parent` is only used to walk up.
 */
export class Section {
  readonly depth: number;
  private readonly values = new Map<string, string>();
  private readonly valueOrder: string[] = [];
  private readonly children = new Map<string, Section>();
  private readonly childOrder: string[] = [];

  private constructor(
    readonly name: string,
    readonly parent: Section | null,
  ) {
    this.depth = parent ? parent.depth + 1 : 0;
  }

  static createRoot(): Section {
    return new Section("", null);
  }

  get isRoot(): boolean {
    return this.parent === null;
  }

  /** Names from the root down to this section; empty for the root. */
  get path(): string[] {
    const names: string[] = [];
    let node: Section | null = this;
    while (node && node.parent) {
      names.unshift(node.name);
      node = node.parent;
    }
    return names;
  }

  get label(): string {
    return this.isRoot ? "<root>" : this.path.join("/");
  }

  get valueCount(): number {
    return this.valueOrder.length;
  }

  get sectionCount(): number {
    return this.childOrder.length;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  find(key: string): string | undefined {
    return this.values.get(key);
  }

  get(key: string): string {
    const value = this.values.get(key);
    if (value === undefined) {
      throw new LookupError("KeyNotFound", key, this.label);
    }
    return value;
  }

  hasSection(name: string): boolean {
    return this.children.has(name);
  }

  findSection(name: string): Section | undefined {
    return this.children.get(name);
  }

  section(name: string): Section {
    const child = this.children.get(name);
    if (!child) {
      throw new LookupError("SectionNotFound", name, this.label);
    }
    return child;
  }

  at(...names: string[]): Section {
    let node: Section = this;
    for (const [index, name] of names.entries()) {
      const child = node.findSection(name);
      if (!child) {
        throw new LookupError("SectionNotFound", names.slice(0, index + 1).join("/"), this.label);
      }
      node = child;
    }
    return node;
  }

  keys(): readonly string[] {
    return this.valueOrder;
  }

  sectionNames(): readonly string[] {
    return this.childOrder;
  }

  *entries(): IterableIterator<[string, string]> {
    for (const key of this.valueOrder) {
      const value = this.values.get(key);
      if (value !== undefined) {
        yield [key, value];
      }
    }
  }

  *sections(): IterableIterator<Section> {
    for (const name of this.childOrder) {
      const child = this.children.get(name);
      if (child) {
        yield child;
      }
    }
  }

  /** Returns false when the key already exists; the stored value is left untouched. */
  insertValue(key: string, value: string): boolean {
    if (this.values.has(key)) {
      return false;
    }
    this.values.set(key, value);
    this.valueOrder.push(key);
    return true;
  }

  /** Returns null when a child with that name already exists. */
  addSection(name: string): Section | null {
    if (this.children.has(name)) {
      return null;
    }
    const child = new Section(name, this);
    this.children.set(name, child);
    this.childOrder.push(name);
    return child;
  }

  /** Drops every value and child; only used when the owning parser is cleared. */
  reset(): void {
    this.values.clear();
    this.valueOrder.length = 0;
    this.children.clear();
    this.childOrder.length = 0;
  }
}
