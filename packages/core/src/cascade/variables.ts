/**
 * Custom-property scopes. A node's scope holds the variables its matched
 * rules declare and falls back to its ancestors' scopes.
 */
export class VariableContext {
  static readonly EMPTY = new VariableContext(null, new Map());

  private constructor(
    private readonly parent: VariableContext | null,
    private readonly vars: ReadonlyMap<string, string>,
  ) {}

  static from(entries: Iterable<readonly [string, string]>): VariableContext {
    return VariableContext.EMPTY.child(entries);
  }

  /** Raw text of `name` in the nearest scope that declares it. */
  lookup(name: string): string | undefined {
    const value = this.vars.get(name);
    if (value !== undefined) return value;
    return this.parent?.lookup(name);
  }

  /** Nested scope. Later entries overwrite earlier ones with the same name. */
  child(entries: Iterable<readonly [string, string]>): VariableContext {
    const vars = new Map(entries);
    return vars.size === 0 ? this : new VariableContext(this, vars);
  }

  /** Every visible variable, nearest scope winning. */
  entries(): Map<string, string> {
    const visible = this.parent ? this.parent.entries() : new Map<string, string>();
    for (const [name, value] of this.vars) visible.set(name, value);
    return visible;
  }
}
