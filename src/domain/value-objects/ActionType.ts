/**
 * ActionType - Urgency classification of a resource action.
 *
 * Ordered from least to most urgent. Arbitration compares ordinals,
 * never the string values.
 */

export type ActionType =
    | 'opportunistic'
    | 'reactive'
    | 'proactive'
    | 'critical'
    | 'emergency';

export const ACTION_TYPES: readonly ActionType[] = [
    'opportunistic',
    'reactive',
    'proactive',
    'critical',
    'emergency',
];

export const ACTION_TYPE_ORDINAL: Readonly<Record<ActionType, number>> = {
    opportunistic: 0,
    reactive: 1,
    proactive: 2,
    critical: 3,
    emergency: 4,
};

export const ActionTypeUtils = {
    ordinal(type: ActionType): number {
        return ACTION_TYPE_ORDINAL[type];
    },

    /**
     * Descending urgency comparator for Array.prototype.sort (stable).
     */
    byUrgencyDesc(a: ActionType, b: ActionType): number {
        return ACTION_TYPE_ORDINAL[b] - ACTION_TYPE_ORDINAL[a];
    },

    isAtLeast(type: ActionType, floor: ActionType): boolean {
        return ACTION_TYPE_ORDINAL[type] >= ACTION_TYPE_ORDINAL[floor];
    },
};
