export type JsonValue =
    | string
    | number
    | boolean
    | null
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        Object.values(value).every(isJsonValue)
    );
}

export function isJsonValue(value: unknown): value is JsonValue {
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(value);
        case 'object':
            if (value === null) {
                return true;
            }

            if (Array.isArray(value)) {
                return value.every(isJsonValue);
            }

            return Object.values(value).every(isJsonValue);
        default:
            return false;
    }
}
