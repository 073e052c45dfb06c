// Clinical policy constants shared by the resolver, IOB estimator and dose calculator.

export const TARGET_BG = 100; // mg/dL

export const DEFAULT_ISF = 50; // mg/dL per unit
export const DEFAULT_ICR = 10; // g per unit

/** "1700 rule": ISF = 1700 / TDD. Some clinics use 1800. */
export const ISF_RULE = 1700;
/** "500 rule": ICR = 500 / TDD. */
export const ICR_RULE = 500;

export const ISF_BOUNDS = { min: 10, max: 200 } as const;
export const ICR_BOUNDS = { min: 3, max: 50 } as const;

export const TDD_LOOKBACK_DAYS = 7;
export const MIN_TDD_DAYS = 3;

export const INSULIN_ACTION_MINUTES = 240;
export const INSULIN_HALF_LIFE_MINUTES = 75;
