// Domain types shared across the application

export type Product = {
  readonly id: string;
  readonly name: string;
  // recommended retail price per unit, ex VAT
  readonly rrp: number;
  readonly vatRate: number;
  readonly quantity: number;
  readonly category: string;
  readonly supplier: string;
  readonly createdDate?: Date;
};

export type ProductEnsemble = {
  readonly id: string;
  readonly name: string;
  readonly products: readonly Product[];
  readonly ensembleDiscount: number;
  readonly theme: string;
  readonly quantity: number;
  readonly createdDate?: Date;
};

export type ProductKit = {
  readonly id: string;
  readonly name: string;
  readonly mandatoryProducts: readonly Product[];
  readonly optionalProducts: readonly Product[];
  // zero or negative means "derive from the contents"
  readonly kitPrice: number;
  readonly kitType: string;
  readonly quantity: number;
  readonly isCustomizable: boolean;
  readonly createdDate?: Date;
};

export type DiscountCode = {
  readonly code: string;
  readonly discountPercentage: number;
  readonly maxDiscountAmount: number;
  readonly validFrom: Date;
  readonly validTo: Date;
  readonly maxUsages: number;
  readonly currentUsages: number;
  readonly applicableCategories: readonly string[];
  readonly minOrderAmount: number;
  readonly isActive: boolean;
};

export type PaymentMethod = {
  readonly type: string;
  readonly provider: string;
  readonly lastFourDigits: string;
  readonly transactionId: string;
  readonly transactionDate?: Date;
  readonly processingFee: number;
  readonly isVerified: boolean;
};

export type Order = {
  readonly id: string;
  readonly orderDate: Date | null;
  readonly customerId: string;
  readonly customerEmail: string;
  readonly individualProducts: readonly Product[];
  readonly productEnsembles: readonly ProductEnsemble[];
  readonly productKits: readonly ProductKit[];
  readonly appliedDiscountCodes: readonly DiscountCode[];
  readonly paymentMethod: PaymentMethod | null;
  readonly actualPricePaid: number;
  readonly shippingCost: number;
  readonly status: string;
  readonly trackingNumber: string;
  readonly shippingAddress?: string;
  readonly billingAddress?: string;
  readonly shippedDate?: Date;
  readonly deliveredDate?: Date;
  readonly promotionalCampaign?: string;
  readonly isGiftOrder?: boolean;
  readonly giftMessage?: string;
  readonly requiresSignature?: boolean;
  readonly orderNotes?: string;
};

export type ProductCalculation = {
  readonly product: Product;
  readonly unitPrice: number;
  readonly totalPrice: number;
  readonly vatAmount: number;
  readonly discountApplied: number;
};

export type EnsembleCalculation = {
  readonly ensemble: ProductEnsemble;
  readonly baseTotal: number;
  readonly discountAmount: number;
  readonly finalTotal: number;
  readonly vatAmount: number;
  readonly productCalculations: readonly ProductCalculation[];
};

export type KitCalculation = {
  readonly kit: ProductKit;
  readonly kitUnitPrice: number;
  readonly totalPrice: number;
  readonly vatAmount: number;
  readonly mandatoryProductCalculations: readonly ProductCalculation[];
  readonly optionalProductCalculations: readonly ProductCalculation[];
};

export type DiscountIneligibility =
  | 'inactive'
  | 'not_yet_valid'
  | 'expired'
  | 'usage_exhausted'
  | 'below_minimum_order';

export type DiscountApplication = {
  readonly code: string;
  readonly amount: number;
  readonly ineligibility: readonly DiscountIneligibility[];
};

export type CalculationResult = {
  readonly individualProductsTotal: number;
  readonly individualProductsVAT: number;
  readonly ensembleTotal: number;
  readonly ensembleVAT: number;
  readonly kitTotal: number;
  readonly kitVAT: number;
  readonly totalDiscount: number;
  readonly subtotal: number;
  readonly totalVAT: number;
  readonly grandTotal: number;
  readonly productCalculations: readonly ProductCalculation[];
  readonly ensembleCalculations: readonly EnsembleCalculation[];
  readonly kitCalculations: readonly KitCalculation[];
  readonly discountApplications: readonly DiscountApplication[];
};

export type ProcessingResult = {
  readonly success: boolean;
  readonly orderId: string;
  readonly calculationResults: CalculationResult | null;
  readonly csvFilePath: string;
  readonly errorMessage: string | null;
  readonly strategyUsed: string;
  readonly processedAt: Date;
};

export type ProcessOrderRequest = {
  readonly order: Order;
  readonly strategyName: string;
  readonly outputPath: string;
  readonly validateOrder: boolean;
  readonly sendNotifications: boolean;
  readonly logAuditTrail: boolean;
};
