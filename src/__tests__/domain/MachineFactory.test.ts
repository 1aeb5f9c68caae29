// src/__tests__/domain/MachineFactory.test.ts

import { describe, it, expect } from 'vitest';
import { MachineFactory } from '../../domain/factories/MachineFactory';
import { ConfigurationError } from '../../utils/errors';
import { MachineRegistryConfig } from '../../utils/shared';

function registryConfig(overrides: Partial<MachineRegistryConfig> = {}): MachineRegistryConfig {
    return {
        firstMachineId: 'M001',
        machineCount: 6,
        defaultMachineEfficiency: 0.95,
        machineEfficiencies: {},
        baseCycleTimeSeconds: 74,
        ...overrides
    };
}

describe('MachineFactory', () => {
    it('should derive sequential zero-padded ids from the first id', () => {
        const factory = new MachineFactory(registryConfig());
        expect(factory.getMachineIds()).toEqual(['M001', 'M002', 'M003', 'M004', 'M005', 'M006']);
    });

    it('should start numbering at the parsed suffix and keep its width', () => {
        const factory = new MachineFactory(registryConfig({ firstMachineId: 'AB0100', machineCount: 2 }));
        expect(factory.getMachineIds()).toEqual(['AB0100', 'AB0101']);
    });

    it('should pad short suffixes to three digits', () => {
        const factory = new MachineFactory(registryConfig({ firstMachineId: 'M9', machineCount: 2 }));
        expect(factory.getMachineIds()).toEqual(['M009', 'M010']);
    });

    it('should compute effective cycle time as base / efficiency', () => {
        const factory = new MachineFactory(registryConfig({ machineEfficiencies: { M003: 0.8 } }));
        expect(factory.getCycleTimeSeconds('M001')).toBeCloseTo(74 / 0.95, 10);
        expect(factory.getCycleTimeSeconds('M003')).toBe(92.5);
        expect(factory.getMachine('M003').efficiency).toBe(0.8);
    });

    it('should ignore overrides for machines outside the work cell', () => {
        const factory = new MachineFactory(registryConfig({ machineCount: 2, machineEfficiencies: { M099: 0.5 } }));
        expect(factory.getMachineIds()).toEqual(['M001', 'M002']);
        expect(factory.machines.has('M099')).toBe(false);
    });

    it('should reject a malformed first machine id', () => {
        expect(() => new MachineFactory(registryConfig({ firstMachineId: '001' }))).toThrow(ConfigurationError);
        expect(() => new MachineFactory(registryConfig({ firstMachineId: 'M-1' }))).toThrow('first_machine_id');
    });

    it('should reject efficiencies outside (0, 1]', () => {
        expect(() => new MachineFactory(registryConfig({ defaultMachineEfficiency: 0 }))).toThrow(ConfigurationError);
        expect(() => new MachineFactory(registryConfig({ machineEfficiencies: { M002: 1.2 } }))).toThrow('Efficiency of M002');
    });

    it('should reject a non-positive machine count', () => {
        expect(() => new MachineFactory(registryConfig({ machineCount: 0 }))).toThrow('machine_count');
    });

    it('should sort a selection into registry order', () => {
        const factory = new MachineFactory(registryConfig());
        expect(factory.inRegistryOrder(['M005', 'M001', 'M003'])).toEqual(['M001', 'M003', 'M005']);
    });

    it('should throw for unknown machines', () => {
        const factory = new MachineFactory(registryConfig());
        expect(() => factory.getMachine('X001')).toThrow('Machine X001 not found');
    });
});
