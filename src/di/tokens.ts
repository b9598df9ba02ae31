/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // INVOCATION (the re-invocation core and its ports)
  // ═══════════════════════════════════════════════════════════════════
  Invocation: {
    /** Transport to the handler endpoint */
    HandlerClient: Symbol('Invocation.HandlerClient'),
    /** Cancellable inter-invocation wait */
    Sleeper: Symbol('Invocation.Sleeper'),
    /** Bearer token minting */
    BearerTokens: Symbol('Invocation.BearerTokens'),
    /** State machine driver */
    Loop: Symbol('Invocation.Loop'),
    /** Action + body → outcome */
    InvokeHandler: Symbol('Invocation.InvokeHandler'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** Logger factory (pino) */
    LoggerFactory: Symbol('Infra.LoggerFactory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test/cli) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling, etc) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
