/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by domain.
 *
 * ADDING A NEW PORT:
 * 1. Add token here under the matching namespace
 * 2. Register an adapter in container.ts
 * 3. Resolve it in the composition root (cli.ts), never inside commands
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // FIRMWARE CRYPTO + I/O PORTS
  // ═══════════════════════════════════════════════════════════════════
  Firmware: {
    /** HMAC-SHA256 + constant-time compare */
    Hmac: Symbol('Firmware.Hmac'),
    /** CSPRNG byte source */
    Entropy: Symbol('Firmware.Entropy'),
    /** Strict hex codec */
    Hex: Symbol('Firmware.Hex'),
    /** File read/write for inputs and outputs */
    FileSystem: Symbol('Firmware.FileSystem'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory (pino) */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
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
