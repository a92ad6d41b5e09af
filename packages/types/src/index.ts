// ============================================================================
// Camera Parameters
// ============================================================================

/**
 * Wire protocols a camera can be driven with.
 * `mock` is a simulated camera used for development and tests.
 */
export type ProtocolType = "cgi" | "visca" | "mock";

export type Direction = "increase" | "decrease";

export type PreferredDirection = Direction | "either";

/**
 * Numeric range a camera parameter may take.
 */
export interface ParameterRange {
  min: number;
  max: number;
  step: number;
}

/**
 * A camera parameter as tracked by one camera session.
 * `currentValue` is only trusted while `stale` is false.
 */
export interface CameraParameter extends ParameterRange {
  name: string;
  currentValue: number | null;
  /** Set after any transport failure; cleared by a successful GET or acknowledged SET */
  stale: boolean;
  /** Set when the camera refused the last value; cleared by the next successful GET */
  rejected: boolean;
  updatedAt: string | null;
}

/**
 * Cost configuration for one parameter. Shared read-only across cameras.
 */
export interface CostSpec {
  baseCost: number;
  maxCost: number;
  minCost: number;
  preferredDirection: PreferredDirection;
  /** Per-parameter override of the deviation weight */
  weight?: number;
}

// ============================================================================
// Features
// ============================================================================

export interface HysteresisPercentages {
  deadBandPct: number;
  innerPct: number;
  outerPct: number;
}

/**
 * Acceptable band for one monitored feature.
 */
export interface FeatureBand extends HysteresisPercentages {
  acceptableLow: number;
  acceptableHigh: number;
}

/**
 * One reading from the external feature extractor.
 * Feature values are normalized to [0, 1].
 */
export interface FeatureSample {
  features: Record<string, number>;
  /** Share of the frame covered by the ROI mask, when the extractor reports it */
  maskCoverage?: number;
  capturedAt: string;
}

export type GateState = "INSIDE_DEAD_BAND" | "OUTSIDE_NEEDS_ADJUST";

export interface GateThresholds {
  center: number;
  acceptableRange: number;
  deadBand: number;
  innerThreshold: number;
  outerThreshold: number;
}

export interface GateDecision {
  feature: string;
  state: GateState;
  previousState: GateState;
  measured: number;
  deviation: number;
  thresholds: GateThresholds;
  shouldAdjust: boolean;
}

// ============================================================================
// Commands
// ============================================================================

export type CommandKind = "get" | "set";

export type CommandOutcome = "ok" | "timeout" | "rejected" | "error" | "cancelled";

export interface CommandResult {
  parameterName: string;
  kind: CommandKind;
  requestedValue: number | null;
  achievedValue: number | null;
  outcome: CommandOutcome;
  attempts: number;
  detail?: string;
}

// ============================================================================
// Concurrency
// ============================================================================

export interface ConcurrencyStats {
  enabled: boolean;
  currentLimit: number;
  maxLimit: number;
  successCount: number;
  failureCount: number;
  successRate: number;
  rateLimitingActive: boolean;
  inFlight: number;
  peakInFlight: number;
  rejectedCount: number;
}

// ============================================================================
// Adjustment
// ============================================================================

export interface AdjustmentCandidate {
  parameter: string;
  direction: Direction;
  from: number;
  to: number;
  cost: number;
  headroom: number;
}

export type FeatureAction =
  | "none"
  | "adjusted"
  | "no_suitable_parameter"
  | "rejected"
  | "failed"
  | "skipped";

export interface FeatureReport {
  feature: string;
  state: GateState;
  /** Null when the sample carried no value for this feature */
  measured: number | null;
  center: number;
  deviation: number | null;
  targetSource: "static" | "sync";
  action: FeatureAction;
  candidate?: AdjustmentCandidate;
  outcome?: CommandOutcome;
  detail?: string;
}

export interface CycleReport {
  cameraId: string;
  cycle: number;
  startedAt: string;
  durationMs: number;
  features: FeatureReport[];
}

export interface AdjustmentRecord {
  feature: string;
  measured: number;
  parameter: string;
  from: number;
  to: number;
  cost: number;
  outcome: CommandOutcome;
  timestamp: string;
}

// ============================================================================
// Sync
// ============================================================================

export interface TargetFeature {
  featureName: string;
  value: number;
  timestamp: number;
  sourceCameraId: string;
}

/**
 * Payload published on `features.target.<feature>`
 */
export interface TargetFeaturePayload {
  value: number;
  timestamp: number;
  camera_id: string;
}

// ============================================================================
// Health
// ============================================================================

export type CameraHealthStatus = "healthy" | "reconnecting" | "unhealthy" | "warming_up";

export interface WatchdogStatus {
  status: CameraHealthStatus;
  consecutiveFailures: number;
  reconnectAttempts: number;
  lastReconnectAt: string | null;
  isConnected: boolean;
}

export interface CameraSummary {
  cameraId: string;
  protocol: ProtocolType;
  host: string;
  role: "master" | "slave";
  running: boolean;
  health: WatchdogStatus;
  cycles: number;
  lastCycleAt: string | null;
}

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}
