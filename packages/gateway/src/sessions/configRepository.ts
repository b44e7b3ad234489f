import { ValidationError, err, ok, type Result } from "../errors";
import type { ProviderConfig, ProviderType } from "../types";

export interface ConfigRepository {
  saveProviderConfig(config: ProviderConfig): Promise<Result<void>>;
  /** Resolves to `undefined` when the provider is not configured. */
  getProviderConfig(type: ProviderType): Promise<Result<ProviderConfig | undefined>>;
  deleteProviderConfig(type: ProviderType): Promise<Result<void>>;
  getAllConfigs(): Promise<Result<ProviderConfig[]>>;
}

export class InMemoryConfigRepository implements ConfigRepository {
  private configs = new Map<ProviderType, ProviderConfig>();

  constructor(initial: ProviderConfig[] = []) {
    for (const config of initial) {
      this.configs.set(config.type, config);
    }
  }

  async saveProviderConfig(config: ProviderConfig): Promise<Result<void>> {
    this.configs.set(config.type, config);
    return ok(undefined);
  }

  async getProviderConfig(type: ProviderType): Promise<Result<ProviderConfig | undefined>> {
    return ok(this.configs.get(type));
  }

  async deleteProviderConfig(type: ProviderType): Promise<Result<void>> {
    if (type === "claude") {
      return err(new ValidationError("Cannot delete Claude config", ["Claude is the default provider"]));
    }
    this.configs.delete(type);
    return ok(undefined);
  }

  async getAllConfigs(): Promise<Result<ProviderConfig[]>> {
    return ok([...this.configs.values()]);
  }
}
