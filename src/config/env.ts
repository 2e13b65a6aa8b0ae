// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; they are only read when yielded
 * at the application boundary (program.ts).
 */

import {
  Config,
  type ConfigError as EffectConfigError,
  ConfigProvider,
  Effect,
  type Option,
} from "effect";
import { ConfigError, ErrorCode } from "../lib/errors";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values";

export interface EnvConfig {
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
  readonly debug: boolean;
  readonly rosterFile: Option.Option<string>;
}

// ============================================================================
// Primitive Configs
// ============================================================================

export const LogLevelConfig: Config.Config<LogLevel> = Config.nested(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL").pipe(Config.withDefault(LOG_LEVEL_DEFAULT)),
  "ROSTER"
);

export const LogFormatConfig: Config.Config<LogFormat> = Config.nested(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT").pipe(Config.withDefault(LOG_FORMAT_DEFAULT)),
  "ROSTER"
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "ROSTER"
);

/** Roster file to load instead of the built-in sample. */
export const RosterFileConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.string("FILE")),
  "ROSTER"
);

// ============================================================================
// Composite Config
// ============================================================================

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  LogLevelConfig,
  LogFormatConfig,
  DebugModeConfig,
  RosterFileConfig,
]).pipe(
  Config.map(([level, format, debug, rosterFile]) => ({
    logging: { level, format },
    debug,
    rosterFile,
  }))
);

/** Reads EnvConfigSpec, reporting bad values as a rosterfold ConfigError. */
export const loadEnvConfig: Effect.Effect<EnvConfig, ConfigError> = Effect.mapError(
  EnvConfigSpec,
  (e: EffectConfigError.ConfigError): ConfigError =>
    new ConfigError({
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
      message: `Invalid environment configuration: ${String(e)}`,
    })
);

/** Debug mode wins over any explicit level. */
export const effectiveLogLevel = (env: EnvConfig): LogLevel =>
  env.debug ? "debug" : env.logging.level;

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  logLevel: "ROSTER_LOG_LEVEL",
  logFormat: "ROSTER_LOG_FORMAT",
  debug: "ROSTER_DEBUG",
  rosterFile: "ROSTER_FILE",
} as const;

export interface TestConfigOverrides {
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly debug?: string;
  readonly rosterFile?: string;
}

/**
 * ConfigProvider for tests. Unset overrides fall back to the defaults above,
 * and ROSTER_FILE is absent unless given.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const env = await Effect.runPromise(Effect.withConfigProvider(loadEnvConfig, provider));
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const values = new Map<string, string>([
    [envVarNames.logLevel, overrides.logLevel ?? LOG_LEVEL_DEFAULT],
    [envVarNames.logFormat, overrides.logFormat ?? LOG_FORMAT_DEFAULT],
    [envVarNames.debug, overrides.debug ?? "false"],
  ]);
  if (overrides.rosterFile !== undefined) {
    values.set(envVarNames.rosterFile, overrides.rosterFile);
  }
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};
