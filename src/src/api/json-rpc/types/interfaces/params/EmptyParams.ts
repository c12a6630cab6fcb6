export type EmptyParams = Record<string, never>;
