import type {
  ExecutionOrder,
  IInstanceManager,
  InstanceConfig,
  InstanceName,
  PluginName,
} from '@keel/types';
import type { KeelConfig } from '../config/ConfigLoader.js';
import type { ManagerRegistry } from '../plugins/ManagerRegistry.js';

/**
 * State of a single validation run.
 *
 * Created at pipeline start and handed to every stage; each stage fills in
 * the part it owns and later stages only read it. Reading a part that no
 * stage has produced yet is a pipeline ordering bug and throws.
 */
export class RunState {
  readonly configPath: string;
  /** Plugins selected by the caller; empty means all installed */
  readonly pluginFilter: ReadonlySet<PluginName>;
  readonly registry: ManagerRegistry;

  private _config: KeelConfig | undefined;
  private _managers: ReadonlyMap<PluginName, IInstanceManager> | undefined;
  private _instanceConfigs: ReadonlyMap<PluginName, ReadonlyMap<InstanceName, InstanceConfig>> | undefined;
  private _executionOrder: ExecutionOrder | undefined;
  private _usesExternalMetadata: boolean | undefined;

  constructor(configPath: string, pluginFilter: ReadonlySet<PluginName>, registry: ManagerRegistry) {
    this.configPath = configPath;
    this.pluginFilter = pluginFilter;
    this.registry = registry;
  }

  get config(): KeelConfig {
    return this.require(this._config, 'config');
  }

  set config(config: KeelConfig) {
    this._config = config;
  }

  get managers(): ReadonlyMap<PluginName, IInstanceManager> {
    return this.require(this._managers, 'managers');
  }

  set managers(managers: ReadonlyMap<PluginName, IInstanceManager>) {
    this._managers = managers;
  }

  get instanceConfigs(): ReadonlyMap<PluginName, ReadonlyMap<InstanceName, InstanceConfig>> {
    return this.require(this._instanceConfigs, 'instanceConfigs');
  }

  set instanceConfigs(configs: ReadonlyMap<PluginName, ReadonlyMap<InstanceName, InstanceConfig>>) {
    this._instanceConfigs = configs;
  }

  get executionOrder(): ExecutionOrder {
    return this.require(this._executionOrder, 'executionOrder');
  }

  set executionOrder(order: ExecutionOrder) {
    this._executionOrder = order;
  }

  get usesExternalMetadata(): boolean {
    return this.require(this._usesExternalMetadata, 'usesExternalMetadata');
  }

  set usesExternalMetadata(value: boolean) {
    this._usesExternalMetadata = value;
  }

  /**
   * Plugins with at least one configured instance, in base order.
   * Instance loading drops plugins without instances, so these are the keys.
   */
  get activePlugins(): PluginName[] {
    return [...this.instanceConfigs.keys()];
  }

  /** Manager of an active plugin */
  managerFor(plugin: PluginName): IInstanceManager {
    const manager = this.managers.get(plugin);
    if (!manager) {
      throw new Error(`No manager loaded for plugin '${plugin}'`);
    }
    return manager;
  }

  private require<T>(value: T | undefined, name: string): T {
    if (value === undefined) {
      throw new Error(`Run state '${name}' accessed before the stage producing it ran`);
    }
    return value;
  }
}
