export interface IMachine {
    id: string;
    efficiency: number;
    cycleTimeSeconds: number;
}

export class Machine implements IMachine {
    public readonly id: string;
    public readonly efficiency: number;
    public readonly cycleTimeSeconds: number;

    constructor(config: IMachine) {
        this.id = config.id;
        this.efficiency = config.efficiency;
        this.cycleTimeSeconds = config.cycleTimeSeconds;
    }
}
