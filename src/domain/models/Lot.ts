export interface ILot {
    id: string;
    sequence: number;
    mintedAt: number;
}
