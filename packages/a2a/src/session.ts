import { createA2AClientToolProvider, type A2AClientToolProvider } from "./provider.js";
import type { A2aProviderOptions } from "./types.js";

export interface A2aSessionOptions extends A2aProviderOptions {
  /** Discover the known agents before running the session body */
  readonly eagerDiscovery?: boolean | undefined;
}

/**
 * Run `fn` with a fresh provider and close it afterwards, whether `fn`
 * returns or throws. An error from `fn` propagates once the provider is
 * closed.
 */
export async function withA2AClient<T>(
  options: A2aSessionOptions,
  fn: (provider: A2AClientToolProvider) => Promise<T>,
): Promise<T> {
  const { eagerDiscovery, ...providerOptions } = options;
  const provider = createA2AClientToolProvider(providerOptions);
  try {
    if (eagerDiscovery === true) {
      await provider.start();
    }
    return await fn(provider);
  } finally {
    await provider.close();
  }
}
