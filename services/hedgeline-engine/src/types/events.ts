/**
 * Events emitted by the cycle orchestrator
 */
import type { CycleResult, CycleState } from './cycle';
import type { ExecutionResult } from './execution';
import type { FundingAnalysis, SideAssignment } from './funding';
import type { EmergencyAction } from './safety';
import type { SizingResult } from './sizing';

export interface StateChange {
  from: CycleState;
  to: CycleState;
  cycleId?: string;
}

export interface CycleStartEvent {
  cycleId: string;
  startTime: number;
}

export interface EngineEvents {
  'state:changed': (change: StateChange) => void;
  'cycle:start': (event: CycleStartEvent) => void;
  'cycle:end': (result: CycleResult) => void;
  'funding:analyzed': (analysis: FundingAnalysis, cycleId: string) => void;
  'sides:assigned': (assignment: SideAssignment, cycleId: string) => void;
  'sizing:decided': (sizing: SizingResult, cycleId: string) => void;
  'position:opened': (result: ExecutionResult, cycleId: string) => void;
  'position:closed': (result: ExecutionResult, cycleId: string) => void;
  emergency: (action: EmergencyAction) => void;
}
