import { ApplePasswordsProvider } from './apple-passwords.js';
import { BitwardenProvider } from './bitwarden.js';
import { ChromiumProvider } from './chromium.js';
import { DashlaneProvider } from './dashlane.js';
import { FirefoxProvider } from './firefox.js';
import { KasperskyProvider } from './kaspersky.js';
import { LastPassProvider } from './lastpass.js';
import { NordPassProvider } from './nordpass.js';
import { ProtonPassProvider } from './protonpass.js';
import { ProviderRegistry } from './registry.js';
import { RoboFormProvider } from './roboform.js';

export { BaseProvider } from './base.js';
export { ProviderRegistry } from './registry.js';
export {
  ApplePasswordsProvider,
  BitwardenProvider,
  ChromiumProvider,
  DashlaneProvider,
  FirefoxProvider,
  KasperskyProvider,
  LastPassProvider,
  NordPassProvider,
  ProtonPassProvider,
  RoboFormProvider,
};

/**
 * Registry with every built-in provider. Proton Pass is registered first;
 * `list()` order is the order shown to users.
 */
export function createDefaultRegistry(options: { freeze?: boolean } = {}): ProviderRegistry {
  const registry = new ProviderRegistry()
    .register(new ProtonPassProvider())
    .register(new BitwardenProvider())
    .register(new LastPassProvider())
    .register(new ChromiumProvider())
    .register(new FirefoxProvider())
    .register(new DashlaneProvider())
    .register(new NordPassProvider())
    .register(new RoboFormProvider())
    .register(new ApplePasswordsProvider())
    .register(new KasperskyProvider());
  return options.freeze ? registry.freeze() : registry;
}
