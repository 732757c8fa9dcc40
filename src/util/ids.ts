import { v7 as uuidv7 } from 'uuid';

export type IdPrefix = 'REQ' | 'APR' | 'LOG' | 'NTF';

/** Time-ordered, collision-resistant ID such as `LOG-0192...`. */
export function newId(prefix: IdPrefix): string {
    return `${prefix}-${uuidv7()}`;
}
