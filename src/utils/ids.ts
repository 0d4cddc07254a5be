import { v4 as uuidv4 } from 'uuid';

export type IdPrefix = 'wal' | 'led' | 'chg' | 'ord' | 'ins' | 'whl' | 'dlv';

/**
 * Prefixed random identifier, e.g. `chg_3b241101-e2bb-4255-8caf-4136c566a962`
 */
export const generateId = (prefix: IdPrefix): string => `${prefix}_${uuidv4()}`;
