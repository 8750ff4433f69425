// ──────────────────────────────────────────
// Commerce: read side exposed to Analytics
// ──────────────────────────────────────────

import type { CommerceContract } from '../../shared/contracts';
import type { IsoDate, OrderForAnalytics, OtherCost } from '../../shared/types';
import { OrderModel } from './models/order';
import { AdSpendModel } from './models/ad-spend';
import { OtherCostModel } from './models/other-cost';

export class CommerceReader implements CommerceContract {
  constructor(
    private orderModel: OrderModel,
    private adSpendModel: AdSpendModel,
    private otherCostModel: OtherCostModel
  ) {}

  async getOrdersForDay(storeId: string, date: IsoDate): Promise<OrderForAnalytics[]> {
    return this.orderModel.getForDay(storeId, date);
  }

  async getAdSpendForDay(storeId: string, date: IsoDate): Promise<number> {
    return this.adSpendModel.getTotalForDay(storeId, date);
  }

  async getOtherCostsForDay(storeId: string, date: IsoDate): Promise<OtherCost[]> {
    return this.otherCostModel.getApplicable(storeId, date);
  }

  async getOrderDates(storeId: string): Promise<IsoDate[]> {
    return this.orderModel.getOrderDates(storeId);
  }
}
