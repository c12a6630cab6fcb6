export enum TransactionFinalityStatus {
    ACCEPTED_ON_L2 = 'ACCEPTED_ON_L2',
    ACCEPTED_ON_L1 = 'ACCEPTED_ON_L1',
}
