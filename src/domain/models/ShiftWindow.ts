export type BreakKind = "BREAK" | "LUNCH";

export interface IBreakWindow {
    kind: BreakKind;
    startTime: number;
    endTime: number;
}

export interface IShiftWindow {
    name: string;
    startTime: number;
    endTime: number;
    activeMachines: number;
    breaks: IBreakWindow[];
}

/**
 * A shift instantiated on a concrete day, with absolute instants.
 */
export class ShiftWindow implements IShiftWindow {
    public readonly name: string;
    public readonly startTime: number;
    public readonly endTime: number;
    public readonly activeMachines: number;
    public readonly breaks: IBreakWindow[];

    constructor(config: IShiftWindow) {
        this.name = config.name;
        this.startTime = config.startTime;
        this.endTime = config.endTime;
        this.activeMachines = config.activeMachines;
        this.breaks = [...config.breaks].sort((a, b) => a.startTime - b.startTime);
    }

    /** Break window containing `instant` (start inclusive, end exclusive). */
    public breakAt(instant: number): IBreakWindow | undefined {
        return this.breaks.find(b => b.startTime <= instant && instant < b.endTime);
    }

    /** First break starting strictly after `after` and strictly before `before`. */
    public nextBreakStart(after: number, before: number): number | undefined {
        const next = this.breaks.find(b => b.startTime > after);
        return next && next.startTime < before ? next.startTime : undefined;
    }
}
