/**
 * msgate — Order Details Mounting
 *
 * Maps an Order Details payload onto the provider's nested
 * `review_and_pay` parameters. Amounts are integers in 1/100 units.
 */

import type { OrderDetails } from '../../messages/types.js';
import type { WireAmount, WireOrderDetails, WirePaymentSetting } from './wire.js';

const AMOUNT_OFFSET = 100;

export function mountOrderDetails(details: OrderDetails, catalogId?: string): WireOrderDetails {
  const { order } = details;

  return {
    reference_id: details.referenceId,
    type: details.type,
    payment_type: details.paymentType,
    payment_settings: paymentSettings(details),
    currency: details.currency,
    total_amount: amount(details.totalAmount),
    order: {
      status: 'pending',
      ...(catalogId ? { catalog_id: catalogId } : {}),
      items: order.items.map((item) => ({
        retailer_id: item.retailerId,
        name: item.name,
        quantity: item.quantity,
        amount: { value: item.amount.value, offset: item.amount.offset },
        ...(item.saleAmount
          ? { sale_amount: { value: item.saleAmount.value, offset: item.saleAmount.offset } }
          : {}),
      })),
      subtotal: amount(order.subtotal),
      tax: amount(order.tax.value, order.tax.description),
      // zero-valued lines are left off
      ...(order.shipping && order.shipping.value > 0
        ? { shipping: amount(order.shipping.value, order.shipping.description) }
        : {}),
      ...(order.discount && order.discount.value > 0
        ? {
            discount: {
              ...amount(order.discount.value, order.discount.description),
              ...(order.discount.programName
                ? { discount_program_name: order.discount.programName }
                : {}),
            },
          }
        : {}),
    },
  };
}

function amount(value: number, description?: string): WireAmount {
  return {
    value,
    offset: AMOUNT_OFFSET,
    ...(description ? { description } : {}),
  };
}

function paymentSettings(details: OrderDetails): WirePaymentSetting[] {
  const settings: WirePaymentSetting[] = [];
  const { paymentLink, pix } = details.paymentSettings;

  if (paymentLink) {
    settings.push({ type: 'payment_link', payment_link: { uri: paymentLink } });
  }
  if (pix) {
    settings.push({
      type: 'pix_dynamic_code',
      pix_dynamic_code: {
        code: pix.code,
        merchant_name: pix.merchantName,
        key: pix.key,
        key_type: pix.keyType,
      },
    });
  }
  return settings;
}
