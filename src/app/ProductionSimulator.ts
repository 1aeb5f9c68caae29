import { SimulationClock } from "./SimulationClock";
import { MachineFactory } from "../domain/factories/MachineFactory";
import { ShiftFactory } from "../domain/factories/ShiftFactory";
import { ShiftWindow } from "../domain/models/ShiftWindow";
import { LotService } from "../domain/services/LotService";
import { AvailabilityService } from "../domain/services/AvailabilityService";
import { CycleOutcomeService } from "../domain/services/CycleOutcomeService";
import { RecordSinkService } from "../domain/services/RecordSinkService";
import { SimulationParameters, SimulationResult, SimulatorCallbacks } from "../utils/shared";
import { RandomSource, randomInt, sample } from "../utils/random";
import { convertTime, DAY_MS, formatDateTime } from "../utils/clock";
import { ConfigurationError, SimulationError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface ProductionSimulatorOptions {
  parameters: SimulationParameters;
  random: RandomSource;
  callbacks?: SimulatorCallbacks;
}

/**
 * State of a single run. Counters live here, not in module globals, so every
 * run starts from zero.
 */
interface SimulationContext {
  partsProduced: number;
  shiftsSimulated: number;
  clock: SimulationClock;
  lots: LotService;
  availability: AvailabilityService;
  outcomes: CycleOutcomeService;
  sink: RecordSinkService;
}

type OperatorAssignment = Map<string, string>;

export class ProductionSimulator {
  private readonly parameters: SimulationParameters;
  private readonly random: RandomSource;
  private readonly callbacks: SimulatorCallbacks;
  private readonly machines: MachineFactory;
  private readonly shifts: ShiftFactory;

  constructor(options: ProductionSimulatorOptions) {
    this.parameters = options.parameters;
    this.random = options.random;
    this.callbacks = options.callbacks ?? {};

    const { totalParts, machineCount, shiftSchedule } = this.parameters;
    if (!Number.isInteger(totalParts) || totalParts < 1) {
      throw new ConfigurationError(`total_parts must be a positive integer, got ${totalParts}`);
    }

    this.machines = new MachineFactory(this.parameters);
    this.shifts = new ShiftFactory(shiftSchedule, this.parameters);

    for (const shift of shiftSchedule) {
      if (shift.activeMachines > machineCount) {
        throw new ConfigurationError(
          `Shift ${shift.name} needs ${shift.activeMachines} active machines but the work cell has ${machineCount}`
        );
      }
    }
  }

  public run(): SimulationResult {
    const ctx = this.createContext();
    const { totalParts, startDate, maxSimulatedDays } = this.parameters;
    const deadline = startDate + maxSimulatedDays * DAY_MS;
    const shiftCount = this.shifts.getDefinitions().length;

    logger().info(`[Simulator] Generating ${totalParts} parts on ${this.machines.getMachineIds().length} machines from ${formatDateTime(startDate)}`);

    let cursor = startDate;
    let isFirstShift = true;

    while (ctx.partsProduced < totalParts) {
      for (let index = 0; index < shiftCount && ctx.partsProduced < totalParts; index++) {
        const shift = this.shifts.createShiftAfter(index, cursor);
        if (shift.startTime >= deadline) {
          throw new SimulationError(
            `Order not completed within ${maxSimulatedDays} simulated days (${ctx.partsProduced}/${totalParts} parts)`,
            { partsProduced: ctx.partsProduced, totalParts }
          );
        }

        this.runShift(ctx, shift, isFirstShift);
        isFirstShift = false;
        cursor = shift.endTime;
      }
    }

    const summary = ctx.sink.summarize();
    logger().info(`[Simulator] Done: ${summary.completeCount} complete, ${summary.errorCount} error records over ${ctx.shiftsSimulated} shifts`);

    return {
      records: ctx.sink.getOrderedRecords(),
      partsProduced: ctx.partsProduced,
      lots: [...ctx.lots.getMintedLots()],
      shiftsSimulated: ctx.shiftsSimulated,
      summary
    };
  }

  private createContext(): SimulationContext {
    const p = this.parameters;
    return {
      partsProduced: 0,
      shiftsSimulated: 0,
      clock: new SimulationClock(p.startDate),
      lots: new LotService(this.random, { prefix: p.lotPrefix, changeoverMinutes: p.lotChangeMinutes }),
      availability: new AvailabilityService(this.random, {
        startupDelaySeconds: p.shiftStartupDelaySeconds,
        resumeDelaySeconds: p.resumeDelaySeconds
      }),
      outcomes: new CycleOutcomeService(this.random, {
        errorProbability: p.errorProbability,
        errorCycleTimeSeconds: p.errorCycleTimeSeconds,
        baseHandlingTimeSeconds: p.baseHandlingTimeSeconds,
        operatorEfficiency: p.defaultOperatorEfficiency,
        operatorEfficiencyVariation: p.operatorEfficiencyVariation
      }),
      sink: new RecordSinkService()
    };
  }

  private runShift(ctx: SimulationContext, shift: ShiftWindow, isFirstShift: boolean): void {
    const { totalParts } = this.parameters;
    const machineIds = this.machines.getMachineIds();

    const changeoverMs = ctx.lots.maybeRollLot(isFirstShift, shift.endTime);
    if (changeoverMs > 0) {
      this.callbacks.onLotChanged?.(ctx.lots.getCurrentLot(), changeoverMs);
    }

    const active = this.machines.inRegistryOrder(sample(this.random, machineIds, shift.activeMachines));
    const operators: OperatorAssignment = new Map(
      active.map((id): [string, string] => [id, `OP${randomInt(this.random, 1000, 9999)}`])
    );

    ctx.clock.reset(shift.startTime);
    ctx.clock.advanceBy(changeoverMs);
    ctx.availability.resetForShift(machineIds, active, ctx.clock.now, shift.endTime);

    logger().debug(`[Simulator] Shift ${shift.name} ${formatDateTime(shift.startTime)} -> ${formatDateTime(shift.endTime)}, active: ${active.join(", ") || "none"}`);
    this.callbacks.onShiftStart?.(shift, active);

    while (!ctx.clock.isPast(shift.endTime) && ctx.partsProduced < totalParts) {
      const now = ctx.clock.advanceTo(ctx.clock.selectNextEvent(shift, ctx.availability, active));
      if (now >= shift.endTime) break;

      for (const machineId of active) {
        if (!ctx.availability.isReady(machineId, now)) continue;

        const breakWindow = shift.breakAt(now);
        if (breakWindow) {
          ctx.availability.enterBreak(machineId, breakWindow);
          continue;
        }

        if (ctx.partsProduced >= totalParts) break;

        if (ctx.availability.isRestartPending(machineId)) {
          ctx.availability.applyRestartDelay(machineId, now);
          continue;
        }

        this.runCycle(ctx, machineId, now, operators);
      }
    }

    ctx.availability.endShift(shift.endTime);
    ctx.shiftsSimulated++;
    logger().debug(`[Simulator] Shift ${shift.name} ended, parts produced so far: ${ctx.partsProduced}`);
    this.callbacks.onShiftEnd?.(shift, ctx.partsProduced);
  }

  private runCycle(ctx: SimulationContext, machineId: string, now: number, operators: OperatorAssignment): void {
    const machine = this.machines.getMachine(machineId);
    const outcome = ctx.outcomes.drawOutcome(machine.cycleTimeSeconds);

    const record = ctx.sink.append({
      timestamp: now,
      machineId,
      productId: this.parameters.productId,
      lotNumber: ctx.lots.getCurrentLot().id,
      cycleTimeSeconds: outcome.durationSeconds,
      status: outcome.status,
      errorCode: outcome.errorCode,
      operatorId: operators.get(machineId) ?? "N/A"
    });

    if (outcome.status === "Complete") {
      ctx.partsProduced++;
    }

    ctx.availability.completeCycle(machineId, now + Math.round(convertTime(outcome.durationSeconds, "s", "ms")));
    this.callbacks.onRecord?.(record);
  }
}
