import { Decimal as BaseDecimal } from 'decimal.js';

// Financial calculations
export const Decimal = BaseDecimal.clone({ precision: 20, rounding: BaseDecimal.ROUND_HALF_UP });
export type Decimal = BaseDecimal;
