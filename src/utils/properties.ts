/**
 * Property helper functions.
 */

function checkType(value: unknown, type: string, name: string): void {
    const types = type.split('|').map((t) => t.trim());
    for (let i = 0; i < types.length; i++) {
        switch (types[i]) {
            case 'any':
                return;
            case 'bigint':
            case 'boolean':
            case 'number':
            case 'string':
                if (typeof value === types[i]) {
                    return;
                }
        }
    }

    const error = new TypeError(`invalid value for type ${type}`);
    Object.assign(error, { code: 'INVALID_ARGUMENT', argument: `value.${name}`, value });

    throw error;
}

/**
 * Assigns the `values` to `target` as read-only values.
 *
 * If `types` is specified, the values are checked.
 *
 * @category Utils
 * @param {Object} target - The target object to assign to.
 * @param {Object} values - The values to assign.
 * @param {Object} types - The types to check.
 */
export function defineProperties<T>(
    target: T,
    values: { [K in keyof T]?: T[K] },
    types?: { [K in keyof T]?: string },
): void {
    for (const key in values) {
        const value = values[key];

        const type = types ? types[key] : null;
        if (type) {
            checkType(value, type, key);
        }

        Object.defineProperty(target, key, { enumerable: true, value, writable: false });
    }
}
