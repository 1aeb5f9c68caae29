// ============================================
// TIPOS DE CONFIGURAÇÃO
// ============================================

import type { IProductionRecord } from "../domain/models/ProductionRecord";
import type { ILot } from "../domain/models/Lot";
import type { IShiftWindow } from "../domain/models/ShiftWindow";

// Turno configurado (time-of-day, sem data)
export interface ShiftDefinition {
  name: string;
  startTime: string;       // "08:00"
  endTime: string;         // "16:00" (<= startTime: termina no dia seguinte)
  activeMachines: number;
}

export interface BreakScheduleConfig {
  breakDurationMinutes: number;
  lunchDurationMinutes: number;
  breakAndLunchHours: number[];   // offsets a partir do início do turno
  lunchHour: number;              // offset que usa a duração do almoço
}

export interface MachineRegistryConfig {
  firstMachineId: string;         // "M001"
  machineCount: number;
  defaultMachineEfficiency: number;              // fração, 0 < e <= 1
  machineEfficiencies: Record<string, number>;   // overrides por máquina (fração)
  baseCycleTimeSeconds: number;
}

export interface OperatorConfig {
  defaultOperatorEfficiency: number;   // fração
  baseHandlingTimeSeconds: number;
  resumeDelaySeconds: number;
  operatorEfficiencyVariation: number; // fração, ex.: 0.05 = ±5%
}

export type OutputFormat = "csv" | "sqlite";

export interface OutputConfig {
  filename: string;
  format: OutputFormat;
}

export type Range = [number, number];

/**
 * Flat parameter set consumed by the simulator.
 * Percentages from the settings document are already converted to fractions.
 */
export interface SimulationParameters extends MachineRegistryConfig, BreakScheduleConfig, OperatorConfig {
  shiftSchedule: ShiftDefinition[];
  shiftStartupDelaySeconds: Range;
  totalParts: number;

  startDate: number;                 // meia-noite UTC do primeiro dia
  seed?: number;
  errorProbability: number;
  errorCycleTimeSeconds: Range;
  lotChangeMinutes: Range;
  lotPrefix: string;
  productId: string;
  maxSimulatedDays: number;

  output: OutputConfig;
}

// ============================================
// ESTADO E RESULTADO DA SIMULAÇÃO
// ============================================

export type AvailabilityPhase = "pending-startup" | "running" | "on-break" | "restarting" | "shift-ended";

export interface MachineStatusSummary {
  complete: number;
  error: number;
}

export interface RunSummary {
  totalRecords: number;
  completeCount: number;
  errorCount: number;
  firstTimestamp: number | null;
  lastTimestamp: number | null;
  lots: string[];
  byMachine: Record<string, MachineStatusSummary>;
}

export interface SimulationResult {
  records: IProductionRecord[];     // ordenados por timestamp
  partsProduced: number;
  lots: ILot[];
  shiftsSimulated: number;
  summary: RunSummary;
}

export interface SimulatorCallbacks {
  onShiftStart?: (shift: IShiftWindow, activeMachines: readonly string[]) => void;
  onShiftEnd?: (shift: IShiftWindow, partsProduced: number) => void;
  onLotChanged?: (lot: ILot, changeoverMs: number) => void;
  onRecord?: (record: IProductionRecord) => void;
}
