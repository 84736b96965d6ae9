/**
 * Instance Types - identities, references and the dependency graph between
 * configured instances of target applications.
 */

/**
 * Name of a registered plugin (target application type).
 * Unique within a run.
 */
export type PluginName = string;

/**
 * Name of a configured instance. Unique within its plugin only:
 * two plugins may each have an instance called "default".
 */
export type InstanceName = string;

/**
 * Composite identity of a configured instance - the unit of graph nodes.
 */
export interface InstanceKey {
  readonly plugin: PluginName;
  readonly instance: InstanceName;
}

/**
 * Dependency declared inside an instance configuration.
 * Without `plugin` the reference points at the declaring instance's own plugin.
 */
export interface InstanceReference {
  readonly plugin?: PluginName;
  readonly instance: InstanceName;
}

/**
 * Directed edge: `from` must be fully processed before `to` may run.
 * Declaring a reference on X to Y yields the edge Y -> X.
 */
export interface DependencyEdge {
  readonly from: InstanceKey;
  readonly to: InstanceKey;
}

export interface DependencyGraph {
  /** Every configured instance of every active plugin, in base order */
  readonly nodes: readonly InstanceKey[];
  readonly edges: readonly DependencyEdge[];
}

/**
 * Instances in the order they must be processed.
 * For every edge a -> b, a appears before b.
 */
export type ExecutionOrder = readonly InstanceKey[];

/**
 * Common fields of every validated instance configuration.
 * Plugins extend this with their own fields.
 */
export type InstanceConfig = {
  readonly hostname: string;
  readonly port: number;
  readonly protocol: 'http' | 'https';
  readonly apiKey?: string;
  readonly dependsOn: readonly InstanceReference[];
};

/** Instance configs of one plugin, keyed by instance name */
export type PluginInstanceConfigs = ReadonlyMap<InstanceName, InstanceConfig>;

/** Instance configs of every active plugin */
export type InstanceConfigMap = ReadonlyMap<PluginName, PluginInstanceConfigs>;
