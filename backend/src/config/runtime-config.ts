import type { ConfigDocument } from "./schemas";

// Set once during bootstrap (or by a test) before the Nest container is built.
let runtimeConfig: Readonly<ConfigDocument> | null = null;

export function setRuntimeConfig(document: ConfigDocument): void {
  runtimeConfig = Object.freeze(structuredClone(document));
}

export function getRuntimeConfig(): Readonly<ConfigDocument> | null {
  return runtimeConfig;
}

export function clearRuntimeConfig(): void {
  runtimeConfig = null;
}
