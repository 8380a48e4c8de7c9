/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Add @singleton() to your class
 * 3. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated application config */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOOP ENGINE
  // ═══════════════════════════════════════════════════════════════════
  Loops: {
    /** Builds loop contexts from config */
    ContextFactory: Symbol('Loops.ContextFactory'),
  },
} as const;
