/**
 * Shared test data. Dates are built in local time so date columns in the
 * reports render the same whatever the machine's time zone.
 */

import {DiscountCode, Order, PaymentMethod, Product, ProductEnsemble, ProductKit} from '../domain';
import {AppEffects} from '../pure/effects';

export const NOW = new Date(2024, 5, 15, 10, 30, 45);

export const product = (overrides: Partial<Product> = {}): Product => ({
  id: 'prod-1',
  name: 'Widget',
  rrp: 10,
  vatRate: 0.2,
  quantity: 2,
  category: 'Homeware',
  supplier: 'Acme Supplies',
  ...overrides,
});

export const ensemble = (overrides: Partial<ProductEnsemble> = {}): ProductEnsemble => ({
  id: 'ens-1',
  name: 'Desk Set',
  products: [
    product({id: 'prod-2', name: 'Lamp', rrp: 10, quantity: 1}),
    product({id: 'prod-3', name: 'Chair', rrp: 20, quantity: 1}),
  ],
  ensembleDiscount: 0.1,
  theme: 'Office',
  quantity: 1,
  ...overrides,
});

export const kit = (overrides: Partial<ProductKit> = {}): ProductKit => ({
  id: 'kit-1',
  name: 'Starter Kit',
  mandatoryProducts: [product({id: 'prod-4', name: 'Brush', rrp: 10, quantity: 1})],
  optionalProducts: [product({id: 'prod-5', name: 'Case', rrp: 5, quantity: 2})],
  kitPrice: 0,
  kitType: 'Starter',
  quantity: 1,
  isCustomizable: false,
  ...overrides,
});

export const discountCode = (overrides: Partial<DiscountCode> = {}): DiscountCode => ({
  code: 'SAVE10',
  discountPercentage: 0.1,
  maxDiscountAmount: 50,
  validFrom: new Date(2024, 0, 1),
  validTo: new Date(2024, 11, 31),
  maxUsages: 100,
  currentUsages: 0,
  applicableCategories: [],
  minOrderAmount: 10,
  isActive: true,
  ...overrides,
});

export const paymentMethod = (overrides: Partial<PaymentMethod> = {}): PaymentMethod => ({
  type: 'CreditCard',
  provider: 'Visa',
  lastFourDigits: '4242',
  transactionId: 'txn-001',
  processingFee: 0.5,
  isVerified: true,
  ...overrides,
});

export const order = (overrides: Partial<Order> = {}): Order => ({
  id: 'order-123',
  orderDate: new Date(2024, 5, 10, 9, 0, 0),
  customerId: 'cust-456',
  customerEmail: 'test@example.com',
  individualProducts: [product()],
  productEnsembles: [],
  productKits: [],
  appliedDiscountCodes: [],
  paymentMethod: paymentMethod(),
  actualPricePaid: 29,
  shippingCost: 5,
  status: 'Processing',
  trackingNumber: 'TRK-1',
  ...overrides,
});

/**
 * Plain jest.fn effects; the report store echoes back the path it was given.
 */
export function createMockEffects(overrides: Partial<AppEffects> = {}): AppEffects {
  return {
    reports: {
      write: jest.fn((outputPath: string, fileName: string) => Promise.resolve(`${outputPath}/${fileName}`)),
    },
    audit: {
      record: jest.fn().mockResolvedValue(undefined),
    },
    notifications: {
      send: jest.fn().mockResolvedValue(undefined),
    },
    clock: {
      now: () => NOW,
    },
    ...overrides,
  };
}
