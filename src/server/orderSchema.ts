/**
 * Shape checks for order requests arriving as JSON. Only structure and types
 * are enforced here; business rules belong to the validator, which reports
 * them as a failed processing result instead of a rejected request.
 */
import {z} from 'zod';
import {Either, Left, Right} from 'purify-ts';
import {Order} from '../domain';

const optionalDate = z.coerce.date().optional();

const productSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  rrp: z.number(),
  vatRate: z.number(),
  quantity: z.number().int(),
  category: z.string().default(''),
  supplier: z.string().default(''),
  createdDate: optionalDate,
});

const ensembleSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  products: z.array(productSchema).default([]),
  ensembleDiscount: z.number().default(0),
  theme: z.string().default(''),
  quantity: z.number().int(),
  createdDate: optionalDate,
});

const kitSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  mandatoryProducts: z.array(productSchema).default([]),
  optionalProducts: z.array(productSchema).default([]),
  kitPrice: z.number().default(0),
  kitType: z.string().default(''),
  quantity: z.number().int(),
  isCustomizable: z.boolean().default(false),
  createdDate: optionalDate,
});

const discountCodeSchema = z.object({
  code: z.string(),
  discountPercentage: z.number(),
  maxDiscountAmount: z.number(),
  validFrom: z.coerce.date(),
  validTo: z.coerce.date(),
  maxUsages: z.number().int(),
  currentUsages: z.number().int().default(0),
  applicableCategories: z.array(z.string()).default([]),
  minOrderAmount: z.number().default(0),
  isActive: z.boolean().default(true),
});

const paymentMethodSchema = z.object({
  type: z.string().default(''),
  provider: z.string().default(''),
  lastFourDigits: z.string().default(''),
  transactionId: z.string().default(''),
  transactionDate: optionalDate,
  processingFee: z.number().default(0),
  isVerified: z.boolean().default(false),
});

export const orderSchema = z.object({
  id: z.string().default(''),
  orderDate: z.coerce.date().nullable().default(null),
  customerId: z.string().default(''),
  customerEmail: z.string().default(''),
  individualProducts: z.array(productSchema).default([]),
  productEnsembles: z.array(ensembleSchema).default([]),
  productKits: z.array(kitSchema).default([]),
  appliedDiscountCodes: z.array(discountCodeSchema).default([]),
  paymentMethod: paymentMethodSchema.nullable().default(null),
  actualPricePaid: z.number().default(0),
  shippingCost: z.number().default(0),
  status: z.string().default(''),
  trackingNumber: z.string().default(''),
  shippingAddress: z.string().optional(),
  billingAddress: z.string().optional(),
  shippedDate: optionalDate,
  deliveredDate: optionalDate,
  promotionalCampaign: z.string().optional(),
  isGiftOrder: z.boolean().optional(),
  giftMessage: z.string().optional(),
  requiresSignature: z.boolean().optional(),
  orderNotes: z.string().optional(),
});

export const processOrderBodySchema = z.object({
  order: orderSchema,
  strategyName: z.string().default('Standard'),
  validateOrder: z.boolean().default(true),
  sendNotifications: z.boolean().default(false),
  logAuditTrail: z.boolean().default(true),
});

// no outputPath: the server supplies it from configuration
export type ProcessOrderBody = {
  readonly order: Order;
  readonly strategyName: string;
  readonly validateOrder: boolean;
  readonly sendNotifications: boolean;
  readonly logAuditTrail: boolean;
};

/**
 * @return the parsed request, or one `path: message` line per schema issue
 */
export function parseProcessOrderBody(body: unknown): Either<string[], ProcessOrderBody> {
  const parsed = processOrderBodySchema.safeParse(body);
  if (!parsed.success) {
    return Left(parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
  }
  return Right(parsed.data);
}
