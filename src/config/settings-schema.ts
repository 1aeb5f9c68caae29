// src/config/settings-schema.ts

import { z } from 'zod';
import { DEFAULT_SHIFT_SCHEDULE, DefaultSettings } from '../domain/config/defaultSettings';
import { isTimeOfDay } from '../utils/clock';

/**
 * Settings document schema (snake_case keys, percentages as in the file).
 * Every key is optional; missing keys take the documented defaults.
 */

const percentage = z.number().gt(0, 'must be greater than 0').max(100, 'must be at most 100');

const timeOfDay = z.string().refine(isTimeOfDay, { message: 'must be a time of day in HH:MM format' });

const range = (min: number) => z
    .tuple([z.number().min(min), z.number().min(min)])
    .refine(([lo, hi]) => lo <= hi, { message: 'range minimum must not exceed its maximum' });

const shiftSchema = z.object({
    name: z.string().min(1),
    start_time: timeOfDay,
    end_time: timeOfDay,
    active_machines: z.number().int().nonnegative(),
});

const defaults = DefaultSettings;

const workCellSchema = z.object({
    first_machine_id: z.string()
        .regex(/^[A-Za-z]+\d+$/, 'must be a letter prefix followed by digits (e.g. M001)')
        .default(defaults.workCell.firstMachineId),
    machine_count: z.number().int().positive().default(defaults.workCell.machineCount),
    default_machine_efficiency: percentage.default(defaults.workCell.defaultMachineEfficiencyPct),
});

const shiftsSchema = z.object({
    shift_schedule: z.array(shiftSchema)
        .min(1, 'must define at least one shift')
        .default(DEFAULT_SHIFT_SCHEDULE.map(s => ({
            name: s.name,
            start_time: s.startTime,
            end_time: s.endTime,
            active_machines: s.activeMachines,
        }))),
    break_duration_minutes: z.number().nonnegative().default(defaults.shifts.breakDurationMinutes),
    lunch_duration_minutes: z.number().nonnegative().default(defaults.shifts.lunchDurationMinutes),
    break_and_lunch_times: z.array(z.number().nonnegative()).default(defaults.shifts.breakAndLunchTimes),
    lunch_hour: z.number().nonnegative().default(defaults.shifts.lunchHour),
    shift_startup_delay_seconds: range(0).default(defaults.shifts.shiftStartupDelaySeconds),
});

const orderSchema = z.object({
    total_parts: z.number().int().positive().default(defaults.order.totalParts),
    base_cycle_time_seconds: z.number().min(0.01).default(defaults.order.baseCycleTimeSeconds),
});

const operatorsSchema = z.object({
    default_operator_efficiency: percentage.default(defaults.operators.defaultOperatorEfficiencyPct),
    base_handling_time_seconds: z.number().nonnegative().default(defaults.operators.baseHandlingTimeSeconds),
    resume_delay_seconds: z.number().nonnegative().default(defaults.operators.resumeDelaySeconds),
    operator_efficiency_variation_percentage: z.number().min(0).max(100)
        .default(defaults.operators.operatorEfficiencyVariationPct),
});

const simulationSchema = z.object({
    // TOML aceita data nativa (start_date = 2025-08-01)
    start_date: z.union([
        z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a date in YYYY-MM-DD format'),
        z.date().transform(date => date.toISOString().slice(0, 10)),
    ]).optional(),
    seed: z.number().int().nonnegative().optional(),
    error_probability: z.number().min(0).lt(1).default(defaults.simulation.errorProbability),
    error_cycle_time_seconds: range(1).default(defaults.simulation.errorCycleTimeSeconds),
    lot_change_minutes: range(0).default(defaults.simulation.lotChangeMinutes),
    lot_prefix: z.string().default(defaults.simulation.lotPrefix),
    product_id: z.union([z.string(), z.number()]).transform(String).default(defaults.simulation.productId),
    max_simulated_days: z.number().int().positive().default(defaults.simulation.maxSimulatedDays),
});

const outputSchema = z.object({
    filename: z.string().min(1).default(defaults.output.filename),
    format: z.enum(['csv', 'sqlite']).default(defaults.output.format),
});

export const settingsSchema = z.object({
    work_cell: workCellSchema.default({}),
    machine_efficiencies: z.record(percentage).default({}),
    shifts: shiftsSchema.default({}),
    order: orderSchema.default({}),
    operators: operatorsSchema.default({}),
    simulation: simulationSchema.default({}),
    output: outputSchema.default({}),
}).superRefine((settings, ctx) => {
    settings.shifts.shift_schedule.forEach((shift, index) => {
        if (shift.active_machines > settings.work_cell.machine_count) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['shifts', 'shift_schedule', index, 'active_machines'],
                message: `exceeds machine_count (${settings.work_cell.machine_count})`,
            });
        }
    });
    if (!settings.shifts.shift_schedule.some(shift => shift.active_machines > 0)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['shifts', 'shift_schedule'],
            message: 'at least one shift needs active machines',
        });
    }
});

export type GeneratorSettings = z.infer<typeof settingsSchema>;
export type GeneratorSettingsInput = z.input<typeof settingsSchema>;
