import type { ConfigFile } from "../config.js";
import { ConfigError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Provider, ProviderRegistry } from "../types.js";
import { GitHubProvider } from "./github/client.js";

type ProviderFactory = (token: string | undefined, logger?: Logger) => Provider;

const FACTORIES: ReadonlyMap<string, ProviderFactory> = new Map<string, ProviderFactory>([
  ["github", (token, logger) => new GitHubProvider({ token: token || undefined, logger })],
]);

export const SUPPORTED_PROVIDERS: readonly string[] = [...FACTORIES.keys()];

/**
 * One provider per provider key that appears under `auth` or `repositories`.
 * @throws ConfigError for a provider key with no implementation.
 */
export function createProviders(config: ConfigFile, logger?: Logger): ProviderRegistry {
  const names = new Set([...Object.keys(config.repositories), ...Object.keys(config.auth)]);
  const providers = new Map<string, Provider>();

  for (const name of names) {
    const factory = FACTORIES.get(name);
    if (!factory) {
      throw new ConfigError(`unsupported provider: ${name}`, [
        `supported providers: ${SUPPORTED_PROVIDERS.join(", ")}`,
      ]);
    }
    providers.set(name, factory(config.auth[name]?.token, logger));
  }
  return providers;
}
