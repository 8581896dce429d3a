/**
 * Custom response function registry.
 *
 * Error types name their override function (`response: { custom_fn }`)
 * rather than holding it, so the name has to resolve somewhere. The
 * registry is that name table. Names are resolved once, at derivation
 * time; a name that is not registered fails the derivation.
 *
 * Usage:
 * ```ts
 * const registry = new CustomFnRegistry();
 * registry.register("plainText", (ctx) =>
 *   new Response(`${ctx.code}: ${ctx.message}`, { status: ctx.statusCode ?? 500 }),
 * );
 * registry.freeze();
 * ```
 */

import type { ResponseRenderer } from "@errmap/context";

// =============================================================================
// Errors
// =============================================================================

export type CustomFnRegistryErrorCode =
  | "INVALID_NAME"
  | "DUPLICATE_NAME"
  | "REGISTRY_FROZEN";

export class CustomFnRegistryError extends Error {
  public readonly code: CustomFnRegistryErrorCode;

  constructor(code: CustomFnRegistryErrorCode, message: string) {
    super(message);
    this.name = "CustomFnRegistryError";
    this.code = code;
  }
}

// =============================================================================
// Registry
// =============================================================================

const NAME_PATTERN = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

export class CustomFnRegistry {
  private readonly _fns = new Map<string, ResponseRenderer>();
  private _frozen = false;

  /**
   * Register a function under a name.
   *
   * Registering the same function under the same name again is a no-op.
   *
   * @throws {CustomFnRegistryError} on an invalid name, a name already
   *   bound to a different function, or a frozen registry
   */
  register(name: string, fn: ResponseRenderer): this {
    if (this._frozen) {
      throw new CustomFnRegistryError(
        "REGISTRY_FROZEN",
        `Cannot register "${name}": registry is frozen`,
      );
    }
    if (!NAME_PATTERN.test(name)) {
      throw new CustomFnRegistryError(
        "INVALID_NAME",
        `Invalid custom function name "${name}"`,
      );
    }

    const existing = this._fns.get(name);
    if (existing !== undefined) {
      if (existing === fn) {
        return this;
      }
      throw new CustomFnRegistryError(
        "DUPLICATE_NAME",
        `Custom function "${name}" is already registered`,
      );
    }

    this._fns.set(name, fn);
    return this;
  }

  get(name: string): ResponseRenderer | undefined {
    return this._fns.get(name);
  }

  has(name: string): boolean {
    return this._fns.has(name);
  }

  names(): readonly string[] {
    return [...this._fns.keys()].sort();
  }

  /** Refuse any further registration. */
  freeze(): void {
    this._frozen = true;
  }

  get frozen(): boolean {
    return this._frozen;
  }

  get size(): number {
    return this._fns.size;
  }
}
