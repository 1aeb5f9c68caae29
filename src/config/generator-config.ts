// src/config/generator-config.ts

/**
 * Generator Configuration Module
 * Loads the settings document (TOML or JSON, by file extension), validates it
 * and resolves the flat parameter set used by the simulator.
 * A missing document is not fatal: defaults are used with a warning.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseToml } from 'smol-toml';
import { ZodError } from 'zod';
import { GeneratorSettings, settingsSchema } from './settings-schema';
import { SimulationParameters } from '../utils/shared';
import { parseIsoDate, todayUtc } from '../utils/clock';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

// Primeiro arquivo existente vence; sem nenhum, config.toml (defaults com aviso)
export const DEFAULT_CONFIG_FILES = ['config.toml', 'generator.config.json'] as const;

/**
 * Helper to access optional environment variables with a default value
 * @param name - Environment variable name
 * @param defaultValue - Default value if not set
 */
export function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

/**
 * Non-negative integer environment variable, or undefined when not set.
 * @throws ConfigurationError if the variable is set to anything else
 */
export function optionalNonNegativeIntEnv(name: string): number | undefined {
    const raw = process.env[name];
    if (!raw) return undefined;
    if (!/^\d+$/.test(raw.trim())) {
        throw new ConfigurationError(`[CONFIG] Environment variable ${name} must be a non-negative integer, got "${raw}"`);
    }
    return parseInt(raw, 10);
}

export function findDefaultConfigFile(dir: string = process.cwd()): string {
    for (const file of DEFAULT_CONFIG_FILES) {
        if (fs.existsSync(path.join(dir, file))) return file;
    }
    return DEFAULT_CONFIG_FILES[0];
}

/**
 * Settings path: first CLI argument, then GENERATOR_CONFIG, then the first
 * default file found in the working directory.
 */
export function resolveConfigPath(args: readonly string[]): string {
    return args[0] || optionalEnv('GENERATOR_CONFIG', findDefaultConfigFile());
}

function parseDocument(configPath: string, raw: string): unknown {
    const extension = path.extname(configPath).toLowerCase();
    switch (extension) {
        case '.toml':
            try {
                return parseToml(raw);
            } catch (parseError) {
                throw new ConfigurationError(`[CONFIG] ${configPath} is not valid TOML: ${String(parseError)}`, { configPath });
            }
        case '.json':
            try {
                return JSON.parse(raw);
            } catch (parseError) {
                throw new ConfigurationError(`[CONFIG] ${configPath} is not valid JSON: ${String(parseError)}`, { configPath });
            }
        default:
            throw new ConfigurationError(`[CONFIG] Unsupported settings file "${configPath}" (expected .toml or .json)`, { configPath });
    }
}

export function loadSettingsDocument(configPath: string): unknown {
    if (!fs.existsSync(configPath)) {
        logger().warn(`[Config] ${configPath} not found. Using default values.`);
        return {};
    }

    logger().info(`[Config] Loading configuration from ${configPath}...`);
    return parseDocument(configPath, fs.readFileSync(configPath, 'utf-8'));
}

function formatIssues(error: ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseSettings(document: unknown): GeneratorSettings {
    const result = settingsSchema.safeParse(document ?? {});
    if (result.success) return result.data;

    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Configuration validation failed:\n  - ${issues.join('\n  - ')}`, { issues });
}

function toFraction(percentage: number): number {
    return percentage / 100;
}

/**
 * Merges the settings document with defaults into SimulationParameters.
 * GENERATOR_SEED, when set, replaces simulation.seed.
 */
export function resolveParameters(document: unknown): SimulationParameters {
    const settings = parseSettings(document);
    const { work_cell, shifts, order, operators, simulation, output } = settings;

    const machineEfficiencies: Record<string, number> = {};
    for (const [machineId, pct] of Object.entries(settings.machine_efficiencies)) {
        machineEfficiencies[machineId] = toFraction(pct);
    }

    const seed = optionalNonNegativeIntEnv('GENERATOR_SEED') ?? simulation.seed;

    return {
        firstMachineId: work_cell.first_machine_id,
        machineCount: work_cell.machine_count,
        defaultMachineEfficiency: toFraction(work_cell.default_machine_efficiency),
        machineEfficiencies,
        baseCycleTimeSeconds: order.base_cycle_time_seconds,

        shiftSchedule: shifts.shift_schedule.map(shift => ({
            name: shift.name,
            startTime: shift.start_time,
            endTime: shift.end_time,
            activeMachines: shift.active_machines,
        })),
        breakDurationMinutes: shifts.break_duration_minutes,
        lunchDurationMinutes: shifts.lunch_duration_minutes,
        breakAndLunchHours: [...shifts.break_and_lunch_times],
        lunchHour: shifts.lunch_hour,
        shiftStartupDelaySeconds: [shifts.shift_startup_delay_seconds[0], shifts.shift_startup_delay_seconds[1]],

        totalParts: order.total_parts,

        defaultOperatorEfficiency: toFraction(operators.default_operator_efficiency),
        baseHandlingTimeSeconds: operators.base_handling_time_seconds,
        resumeDelaySeconds: operators.resume_delay_seconds,
        operatorEfficiencyVariation: toFraction(operators.operator_efficiency_variation_percentage),

        startDate: simulation.start_date ? parseIsoDate(simulation.start_date) : todayUtc(),
        seed,
        errorProbability: simulation.error_probability,
        errorCycleTimeSeconds: [simulation.error_cycle_time_seconds[0], simulation.error_cycle_time_seconds[1]],
        lotChangeMinutes: [simulation.lot_change_minutes[0], simulation.lot_change_minutes[1]],
        lotPrefix: simulation.lot_prefix,
        productId: simulation.product_id,
        maxSimulatedDays: simulation.max_simulated_days,

        output: {
            filename: output.filename,
            format: output.format,
        },
    };
}

export function loadGeneratorParameters(configPath: string): SimulationParameters {
    return resolveParameters(loadSettingsDocument(configPath));
}
