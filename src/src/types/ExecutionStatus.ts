export enum ExecutionStatus {
    SUCCEEDED = 'SUCCEEDED',
    REVERTED = 'REVERTED',
}

export function parseExecutionStatus(value: string): ExecutionStatus | undefined {
    switch (value) {
        case ExecutionStatus.SUCCEEDED:
            return ExecutionStatus.SUCCEEDED;
        case ExecutionStatus.REVERTED:
            return ExecutionStatus.REVERTED;
        default:
            return undefined;
    }
}
