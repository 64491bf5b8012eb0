/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by concern, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Add @singleton() to your class
 * 3. Register the token in container.ts
 * 4. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Path formatting configuration (validated) */
    Path: Symbol('Config.Path'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** Read-only filesystem view used to check and list containers */
    FileSystem: Symbol('Infra.FileSystem'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONTAINERS
  // ═══════════════════════════════════════════════════════════════════
  Containers: {
    /** Opens root/dataset/subject/session/domain/file containers */
    Registry: Symbol('Containers.Registry'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
