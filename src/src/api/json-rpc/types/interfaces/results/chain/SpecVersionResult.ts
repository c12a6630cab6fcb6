export type SpecVersionResult = string;
