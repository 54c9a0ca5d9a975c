/**
 * @fileoverview NestJS module exposing git execution settings read from the environment.
 *
 * Exports:
 * - ConfigModule (L23) - Provides GitConfig under ConfigToken.
 */

import { FactoryProvider, Module } from "@nestjs/common";

import { loadConfig } from "./config";
import { ConfigToken, GitConfig } from "./config.types";

/* GIT_* variables are read once, when the module initializes. */
const gitConfigProvider: FactoryProvider<GitConfig> = {
  provide: ConfigToken,
  useFactory: loadConfig
};

@Module({
  providers: [gitConfigProvider],
  exports: [ConfigToken]
})
export class ConfigModule {}
