/**
 * Validator Registry
 *
 * Routing key → installed module. Keys are unique; one module may sit
 * under several keys.
 */

import { getAddress, isAddressEqual } from "viem";
import { AlreadyInStateError, NotFoundError } from "@tessera/types";
import type { Address, Checkpointable, Restore, ValidationModule } from "@tessera/types";
import type { RoutingKey } from "./routing.js";

export interface ModuleBinding {
  readonly key: RoutingKey;
  readonly module: ValidationModule;
  readonly moduleAddress: Address;
  readonly installedAt: string;
}

export class ValidatorRegistry implements Checkpointable {
  private bindings = new Map<RoutingKey, ModuleBinding>();

  bind(key: RoutingKey, module: ValidationModule, installedAt: string): ModuleBinding {
    if (this.bindings.has(key)) {
      throw new AlreadyInStateError(`Routing key ${key} is already bound`);
    }
    const binding: ModuleBinding = {
      key,
      module,
      moduleAddress: getAddress(module.address),
      installedAt,
    };
    this.bindings.set(key, binding);
    return binding;
  }

  unbind(key: RoutingKey): ModuleBinding {
    const binding = this.bindings.get(key);
    if (binding === undefined) {
      throw new NotFoundError(`Routing key ${key} is not bound`);
    }
    this.bindings.delete(key);
    return binding;
  }

  lookup(key: RoutingKey): ModuleBinding | undefined {
    return this.bindings.get(key);
  }

  has(key: RoutingKey): boolean {
    return this.bindings.has(key);
  }

  /**
   * Whether `address` is installed under any key.
   */
  isInstalled(address: Address): boolean {
    for (const binding of this.bindings.values()) {
      if (isAddressEqual(binding.moduleAddress, address)) return true;
    }
    return false;
  }

  entries(): readonly ModuleBinding[] {
    return [...this.bindings.values()];
  }

  get size(): number {
    return this.bindings.size;
  }

  checkpoint(): Restore {
    const saved = new Map(this.bindings);
    return () => {
      this.bindings = saved;
    };
  }
}
