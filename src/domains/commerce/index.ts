// ──────────────────────────────────────────
// Commerce domain — barrel export
// ──────────────────────────────────────────

export { CommerceReader } from './reader';
export { OrderModel } from './models/order';
export { AdSpendModel } from './models/ad-spend';
export { OtherCostModel } from './models/other-cost';
