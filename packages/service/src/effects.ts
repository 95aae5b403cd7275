/**
 * Side effects for dependency injection. Layers that sleep or read the
 * clock take these so tests can drive a virtual clock.
 */
export interface ServiceEffects {
  delay: (ms: number) => Promise<void>;
  now: () => number;
}

export const defaultEffects: ServiceEffects = {
  delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
  now: () => Date.now(),
};

export function resolveEffects(effects?: Partial<ServiceEffects>): ServiceEffects {
  return { ...defaultEffects, ...effects };
}
