// src/__tests__/domain/AvailabilityService.test.ts

import { describe, it, expect } from 'vitest';
import { AvailabilityService } from '../../domain/services/AvailabilityService';
import { ScriptedRandom } from '../helpers/fixtures';

const SHIFT_START = Date.UTC(2025, 7, 1, 8);
const SHIFT_END = Date.UTC(2025, 7, 1, 16);
const MACHINES = ['M001', 'M002', 'M003'];

function createService(values: number[]): AvailabilityService {
    return new AvailabilityService(new ScriptedRandom(values), {
        startupDelaySeconds: [30, 180],
        resumeDelaySeconds: 120
    });
}

describe('AvailabilityService', () => {
    describe('resetForShift', () => {
        it('should delay each active machine by a startup draw', () => {
            const service = createService([0, 0.5]);
            service.resetForShift(MACHINES, ['M001', 'M003'], SHIFT_START, SHIFT_END);

            expect(service.getNextAvailable('M001')).toBe(SHIFT_START + 30000);
            expect(service.getNextAvailable('M003')).toBe(SHIFT_START + 105000);
            expect(service.getPhase('M001')).toBe('pending-startup');
        });

        it('should park inactive machines until the shift ends', () => {
            const service = createService([0, 0.5]);
            service.resetForShift(MACHINES, ['M001', 'M003'], SHIFT_START, SHIFT_END);

            expect(service.getNextAvailable('M002')).toBe(SHIFT_END);
            expect(service.getPhase('M002')).toBe('shift-ended');
            expect(service.isReady('M002', SHIFT_END - 1)).toBe(false);
        });

        it('should forget the previous shift', () => {
            const service = createService([]);
            service.resetForShift(MACHINES, MACHINES, SHIFT_START, SHIFT_END);
            service.resetForShift(['M001'], ['M001'], SHIFT_END, SHIFT_END + 8 * 3600000);

            expect(() => service.getNextAvailable('M002')).toThrow('M002 has no availability state');
        });
    });

    it('earliestAvailable should return the minimum capped at the limit', () => {
        const service = createService([0, 0.5]);
        service.resetForShift(MACHINES, ['M001', 'M003'], SHIFT_START, SHIFT_END);

        expect(service.earliestAvailable(['M001', 'M003'], SHIFT_END)).toBe(SHIFT_START + 30000);
        expect(service.earliestAvailable(['M001', 'M003'], SHIFT_START)).toBe(SHIFT_START);
        expect(service.earliestAvailable([], SHIFT_END)).toBe(SHIFT_END);
    });

    it('isReady should be true from the next-available instant on', () => {
        const service = createService([0]);
        service.resetForShift(['M001'], ['M001'], SHIFT_START, SHIFT_END);

        expect(service.isReady('M001', SHIFT_START + 29999)).toBe(false);
        expect(service.isReady('M001', SHIFT_START + 30000)).toBe(true);
    });

    describe('break handling', () => {
        const window = { kind: 'BREAK' as const, startTime: SHIFT_START + 7200000, endTime: SHIFT_START + 7800000 };

        it('should hold the machine until the break ends and mark the restart', () => {
            const service = createService([0]);
            service.resetForShift(['M001'], ['M001'], SHIFT_START, SHIFT_END);
            service.enterBreak('M001', window);

            expect(service.getNextAvailable('M001')).toBe(window.endTime);
            expect(service.getPhase('M001')).toBe('on-break');
            expect(service.isRestartPending('M001')).toBe(true);
        });

        it('should apply the restart delay once after the break', () => {
            const service = createService([0, 0.5]);
            service.resetForShift(['M001'], ['M001'], SHIFT_START, SHIFT_END);
            service.enterBreak('M001', window);

            const delay = service.applyRestartDelay('M001', window.endTime);

            expect(delay).toBe(120000);
            expect(service.getNextAvailable('M001')).toBe(window.endTime + 120000);
            expect(service.getPhase('M001')).toBe('restarting');
            expect(service.isRestartPending('M001')).toBe(false);
        });

        it('should draw the restart delay within 20% of the mean', () => {
            const service = createService([0, 0, 0.999999]);
            service.resetForShift(['M001'], ['M001'], SHIFT_START, SHIFT_END);

            expect(service.applyRestartDelay('M001', SHIFT_START)).toBe(96000);
            expect(service.applyRestartDelay('M001', SHIFT_START)).toBe(144000);
        });
    });

    it('completeCycle should move the machine to the cycle end', () => {
        const service = createService([0]);
        service.resetForShift(['M001'], ['M001'], SHIFT_START, SHIFT_END);
        service.completeCycle('M001', SHIFT_START + 113450);

        expect(service.getNextAvailable('M001')).toBe(SHIFT_START + 113450);
        expect(service.getPhase('M001')).toBe('running');
    });

    it('endShift should end every machine no earlier than the shift end', () => {
        const service = createService([0, 0]);
        service.resetForShift(['M001', 'M002'], ['M001', 'M002'], SHIFT_START, SHIFT_END);
        service.completeCycle('M002', SHIFT_END + 5000);
        service.endShift(SHIFT_END);

        expect(service.getNextAvailable('M001')).toBe(SHIFT_END);
        expect(service.getNextAvailable('M002')).toBe(SHIFT_END + 5000);
        expect(service.getPhase('M001')).toBe('shift-ended');
        expect(service.getPhase('M002')).toBe('shift-ended');
    });
});
