import type { ResolutionRule } from '../types.js';

/** Rule set restored by `RuleStore.resetToDefaults()` */
export const DEFAULT_RULES: readonly ResolutionRule[] = [
  // Financial records stay as the store wrote them
  { entityType: 'Receipt', propertyName: null, resolution: 'LocalWins', requireManualReview: false, priority: 10, isActive: true, description: 'Receipts always use local data for financial integrity' },
  { entityType: 'Order', propertyName: null, resolution: 'LocalWins', requireManualReview: false, priority: 10, isActive: true, description: 'Orders use local data for transaction integrity' },

  // HQ owns pricing and master data
  { entityType: 'Product', propertyName: 'Price', resolution: 'RemoteWins', requireManualReview: false, priority: 20, isActive: true, description: 'HQ controls pricing' },
  { entityType: 'Product', propertyName: 'CostPrice', resolution: 'RemoteWins', requireManualReview: false, priority: 20, isActive: true, description: 'HQ controls cost prices' },
  { entityType: 'Product', propertyName: null, resolution: 'RemoteWins', requireManualReview: false, priority: 30, isActive: true, description: 'HQ controls product master data' },
  { entityType: 'Category', propertyName: null, resolution: 'RemoteWins', requireManualReview: false, priority: 30, isActive: true, description: 'HQ controls categories' },

  { entityType: 'Inventory', propertyName: null, resolution: 'LastWriteWins', requireManualReview: false, priority: 40, isActive: true, description: 'Latest inventory count used' },
  { entityType: 'StockMovement', propertyName: null, resolution: 'LocalWins', requireManualReview: false, priority: 40, isActive: true, description: 'Stock movements from local store' },

  // Points balances are reviewed by an operator
  { entityType: 'Customer', propertyName: 'PointsBalance', resolution: 'Manual', requireManualReview: true, priority: 50, isActive: true, description: 'Points changes require manual review' },
  { entityType: 'LoyaltyMember', propertyName: 'Points', resolution: 'Manual', requireManualReview: true, priority: 50, isActive: true, description: 'Loyalty points require manual review' },
];
