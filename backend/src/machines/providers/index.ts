import { ProviderRegistry } from '../registry.js';
import { moonrakerProvider } from './MoonrakerProvider.js';
import { octoPrintProvider } from './OctoPrintProvider.js';
import { simulatedProvider } from './SimulatedProvider.js';

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register('octoprint', octoPrintProvider)
    .register('moonraker', moonrakerProvider)
    .register('simulated', simulatedProvider);
}
