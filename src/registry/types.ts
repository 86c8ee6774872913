/**
 * Node Registry Types
 */

/** One mesh participant as the registry stores it */
export interface MeshNode {
  nodeId: string;
  longName?: string;
  shortName?: string;
  hardwareModel: string;
  /** Percent, 0-100 */
  batteryLevel?: number;
  voltage?: number;
  isCharging?: boolean;
  /** Epoch ms of the most recent contact */
  lastHeard?: number;
  uptimeSeconds?: number;
  /** Only ever changed by setFavorite() */
  isFavorite: boolean;
}

/** A node plus fields derived from the clock at read time */
export interface NodeView extends Readonly<MeshNode> {
  isActive: boolean;
  batteryAlert: boolean;
  /** null for nodes that have never been heard */
  secondsSinceHeard: number | null;
}

export interface RegistryThresholds {
  activeThresholdHours: number;
  /** batteryAlert is set below this level (percent) while not charging */
  batteryAlertThreshold: number;
}

export const DEFAULT_REGISTRY_THRESHOLDS: RegistryThresholds = {
  activeThresholdHours: 2,
  batteryAlertThreshold: 15,
};
