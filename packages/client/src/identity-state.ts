/**
 * Identity lifecycle phases and the transitions allowed between them.
 *
 *   UNINITIALIZED ──init ok──▶ INITIALIZED ◀──retry ok── DEGRADED
 *         └──────init failed─────────┴──────failure──────▶ ┘
 *
 * @module identity-state
 */

export enum IdentityPhase {
  /** No initialization attempted yet. */
  UNINITIALIZED = "UNINITIALIZED",
  /** Seed loaded or generated; keypair derived. */
  INITIALIZED = "INITIALIZED",
  /** The last attempt failed; the next caller retries. */
  DEGRADED = "DEGRADED",
}

const VALID_TRANSITIONS: ReadonlyMap<IdentityPhase, readonly IdentityPhase[]> =
  new Map([
    [IdentityPhase.UNINITIALIZED, [IdentityPhase.INITIALIZED, IdentityPhase.DEGRADED]],
    // Re-entering INITIALIZED is a seed replacement (import or migration).
    [IdentityPhase.INITIALIZED, [IdentityPhase.INITIALIZED, IdentityPhase.DEGRADED]],
    [IdentityPhase.DEGRADED, [IdentityPhase.INITIALIZED, IdentityPhase.DEGRADED]],
  ]);

/** Error thrown on invalid phase transition. */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: IdentityPhase,
    public readonly to: IdentityPhase,
  ) {
    super(
      `Invalid identity transition: ${from} → ${to}. ` +
        `Allowed from ${from}: [${(VALID_TRANSITIONS.get(from) ?? []).join(", ")}]`,
    );
    this.name = "InvalidTransitionError";
  }
}

export function transitionTo(from: IdentityPhase, to: IdentityPhase): IdentityPhase {
  if (!(VALID_TRANSITIONS.get(from) ?? []).includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
  return to;
}
