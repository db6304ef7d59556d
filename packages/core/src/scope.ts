/**
 * Lexical scopes: a name -> value map with a link to the enclosing scope.
 */
export class Scope<T> {
  private bindings = new Map<string, T>();
  private parent: Scope<T> | null;

  constructor(parent: Scope<T> | null = null) {
    this.parent = parent;
  }

  child(): Scope<T> {
    return new Scope(this);
  }

  /** Bind in this scope, replacing any binding of the same name here. */
  declare(name: string, value: T): void {
    this.bindings.set(name, value);
  }

  /**
   * Rebind the nearest enclosing definition of `name`.
   * Returns false when no scope in the chain defines it.
   */
  assign(name: string, value: T): boolean {
    if (this.bindings.has(name)) {
      this.bindings.set(name, value);
      return true;
    }
    if (this.parent) return this.parent.assign(name, value);
    return false;
  }

  lookup(name: string): T | undefined {
    if (this.bindings.has(name)) return this.bindings.get(name);
    if (this.parent) return this.parent.lookup(name);
    return undefined;
  }

  /** Names bound directly in this scope, in declaration order. */
  names(): string[] {
    return [...this.bindings.keys()];
  }
}
