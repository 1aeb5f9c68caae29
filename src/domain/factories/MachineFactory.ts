// src/domain/factories/MachineFactory.ts

import { IMachine, Machine } from "../models/Machine";
import { MachineRegistryConfig } from "../../utils/shared";
import { ConfigurationError } from "../../utils/errors";
import { logger } from "../../utils/logger";

const MACHINE_ID_PATTERN = /^([A-Za-z]+)(\d+)$/;
const MIN_ID_DIGITS = 3;

export interface ParsedMachineId {
    prefix: string;
    startNumber: number;
    width: number;
}

/**
 * Machine registry: ordered machine ids and each machine's effective cycle
 * time (base cycle time / efficiency). Immutable once built.
 */
export class MachineFactory {
    public readonly machines: Map<string, IMachine> = new Map();
    private readonly machineIds: string[] = [];

    constructor(config: MachineRegistryConfig) {
        if (!Number.isInteger(config.machineCount) || config.machineCount < 1) {
            throw new ConfigurationError(`machine_count must be a positive integer, got ${config.machineCount}`);
        }
        if (!(config.baseCycleTimeSeconds > 0)) {
            throw new ConfigurationError(`base_cycle_time_seconds must be positive, got ${config.baseCycleTimeSeconds}`);
        }

        const { prefix, startNumber, width } = MachineFactory.parseMachineId(config.firstMachineId);

        for (let i = 0; i < config.machineCount; i++) {
            const id = `${prefix}${(startNumber + i).toString().padStart(width, "0")}`;
            const efficiency = config.machineEfficiencies[id] ?? config.defaultMachineEfficiency;
            MachineFactory.assertEfficiency(id, efficiency);

            this.machineIds.push(id);
            this.machines.set(id, new Machine({
                id,
                efficiency,
                cycleTimeSeconds: config.baseCycleTimeSeconds / efficiency
            }));
        }

        for (const id of Object.keys(config.machineEfficiencies)) {
            if (!this.machines.has(id)) {
                logger().warn(`[MachineFactory] Efficiency override for unknown machine "${id}" ignored`);
            }
        }
    }

    public static parseMachineId(firstMachineId: string): ParsedMachineId {
        const match = MACHINE_ID_PATTERN.exec(firstMachineId);
        if (!match) {
            throw new ConfigurationError(
                `first_machine_id "${firstMachineId}" must be a letter prefix followed by digits (e.g. M001)`,
                { firstMachineId }
            );
        }
        return {
            prefix: match[1],
            startNumber: parseInt(match[2], 10),
            width: Math.max(MIN_ID_DIGITS, match[2].length)
        };
    }

    private static assertEfficiency(id: string, efficiency: number): void {
        if (!(efficiency > 0 && efficiency <= 1)) {
            throw new ConfigurationError(`Efficiency of ${id} must be in (0, 1], got ${efficiency}`, { id, efficiency });
        }
    }

    public getMachineIds(): readonly string[] {
        return this.machineIds;
    }

    public getMachine(id: string): IMachine {
        const machine = this.machines.get(id);
        if (!machine) throw new Error(`Machine ${id} not found in registry`);
        return machine;
    }

    public getCycleTimeSeconds(id: string): number {
        return this.getMachine(id).cycleTimeSeconds;
    }

    /** Sorts ids into registry order. */
    public inRegistryOrder(ids: readonly string[]): string[] {
        const selected = new Set(ids);
        return this.machineIds.filter(id => selected.has(id));
    }
}
