import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError, ConfigInvalidError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  if (options.config) {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: options.config });
    return ok(undefined);
  }

  // Tests may inject config before initialization; do not overwrite it.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  return loadConfig({ env: options.env ?? process.env }).map((config) => {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but must not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Already validated config; skips env parsing. */
  readonly config?: ValidatedConfig;
  /** Environment to parse when no config is given. Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

async function registerServices(): Promise<void> {
  // Import order matters: dependencies before dependents.
  // @singleton() registers each class; the symbol aliases delegate to it.
  const { PinoLoggerFactory } = await import('../core/logging/create-logger.js');
  const { ProtocolExportService } = await import('../application/services/protocol-export-service.js');

  container.register(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
  container.register(DI.Services.ProtocolExport, {
    useFactory: instanceCachingFactory((c) => c.resolve(ProtocolExportService)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container: runtime ports, config, services.
 *
 * Idempotent: calls after a successful initialization return immediately.
 * A config error comes back as data; nothing is registered past it.
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<Result<void, AppError>> {
  if (initialized) return ok(undefined);

  const log = createBootstrapLogger('di');

  registerRuntime(options);
  const configured = registerConfig(options);
  if (configured.isErr()) {
    log.error({ issues: configured.error.issues }, 'Configuration rejected');
    return err(configured.error);
  }

  try {
    await registerServices();
  } catch (error) {
    return err(Err.startupFailed('service registration', 'Could not register services', error));
  }

  initialized = true;
  log.debug('Container initialized');
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
