export type ProductionStatus = "Complete" | "Error";

export const ERROR_CODES = [
    "E001", "E002", "E003", "E004", "E005",
    "E006", "E007", "E008", "E009", "E010"
] as const;

export type ErrorCode = typeof ERROR_CODES[number];

export const NO_ERROR_CODE = "N/A";

export interface IProductionRecord {
    timestamp: number;
    machineId: string;
    productId: string;
    lotNumber: string;
    cycleTimeSeconds: number;
    status: ProductionStatus;
    errorCode: ErrorCode | typeof NO_ERROR_CODE;
    operatorId: string;
}

export function isErrorCode(value: string): value is ErrorCode {
    return ERROR_CODES.some(code => code === value);
}

export function isProductionStatus(value: string): value is ProductionStatus {
    return value === "Complete" || value === "Error";
}
