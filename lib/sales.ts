/**
 * Mock sales flow: discount codes, order summaries, shipping validation and
 * payment links. No real payment provider is called.
 */

import { randomInt as cryptoRandomInt } from "crypto";
import { createLogger } from "./logger";

const log = createLogger("sales");

/** Inclusive on both ends. */
export type RandomInt = (min: number, max: number) => number;

const defaultRandom: RandomInt = (min, max) => cryptoRandomInt(min, max + 1);

const STORE_URL = "https://cervezafortuna.com";
const CATALOG_PAGE = `${STORE_URL}/inicio/cervezas/`;

// Known product pages, matched by substring of the beer name.
const PRODUCT_PAGES: [string, string][] = [
  ["neippolita", `${STORE_URL}/producto/neippolita/`],
  ["ippolita", `${STORE_URL}/producto/ippolita/`],
  ["hazy pale ale", `${STORE_URL}/producto/hazy-pale-ale/`],
  ["pale ale", `${STORE_URL}/producto/pale-ale/`],
  ["california ale", `${STORE_URL}/producto/california-ale/`],
  ["oat stout", `${STORE_URL}/producto/oat-stout/`],
  ["sake ale", `${STORE_URL}/producto/sake-ale/`],
];

// ── Discount codes ──────────────────────────────────────────────────

export interface DiscountCode {
  code: string;
  discountPercentage: number;
  earned: boolean;
  message: string;
}

/**
 * Earned discounts (after a tasting or a guided purchase) are 10–19%; a code
 * asked for up front is a flat 5%.
 */
export function generateDiscountCode(
  userName = "Cliente",
  earned = true,
  random: RandomInt = defaultRandom,
): DiscountCode {
  const discount = earned ? random(10, 19) : 5;
  const namePart =
    userName && userName !== "Cliente" ? userName.slice(0, 3).toUpperCase() : "VIP";
  const code = `FORTUNA${discount}-${namePart}${random(1000, 9999)}`;

  log.info("generated discount code", { code, discount, earned });

  return {
    code,
    discountPercentage: discount,
    earned,
    message: `¡Código especial generado! Usa ${code} para obtener ${discount}% de descuento en tu compra.`,
  };
}

// ── Purchase assistance ─────────────────────────────────────────────

export interface PurchaseSummary {
  orderId: string;
  beers: string[];
  purchaseLinks: Record<string, string>;
  totalItems: number;
  discountApplied: boolean;
  discountCode: string | null;
  message: string;
}

export function productLink(beerName: string): string {
  const lower = beerName.toLowerCase();
  const match = PRODUCT_PAGES.find(([key]) => lower.includes(key));
  return match ? match[1] : CATALOG_PAGE;
}

export function processPurchaseAssistance(
  userName: string,
  beers: string[],
  discountCode: string | null = null,
  random: RandomInt = defaultRandom,
): PurchaseSummary {
  const orderId = `FORT-${random(10000, 99999)}`;
  const purchaseLinks: Record<string, string> = {};
  for (const beer of beers) purchaseLinks[beer] = productLink(beer);

  log.info("purchase assistance processed", { orderId, beers: beers.length });

  return {
    orderId,
    beers,
    purchaseLinks,
    totalItems: beers.length,
    discountApplied: discountCode !== null,
    discountCode,
    message: `¡Perfecto, ${userName}! Tu pedido está listo para procesar.`,
  };
}

// ── Shipping info ───────────────────────────────────────────────────

export interface ShippingInfo {
  fullName: string;
  email: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  postalCode: string;
}

export type ShippingResult =
  | { ok: true; shippingInfo: ShippingInfo; message: string }
  | { ok: false; error: string; message: string };

export function collectShippingInfo(info: ShippingInfo): ShippingResult {
  if (!info.fullName || info.fullName.length < 3) {
    return {
      ok: false,
      error: "Nombre inválido",
      message: "El nombre debe tener al menos 3 caracteres",
    };
  }
  if (!info.email || !info.email.includes("@")) {
    return {
      ok: false,
      error: "Email inválido",
      message: "Por favor proporciona un email válido",
    };
  }
  if (!info.phone || info.phone.length < 10) {
    return {
      ok: false,
      error: "Teléfono inválido",
      message: "El teléfono debe tener al menos 10 dígitos",
    };
  }
  if (!info.address || info.address.length < 5) {
    return {
      ok: false,
      error: "Dirección inválida",
      message: "Por favor proporciona una dirección completa",
    };
  }

  log.info("shipping info collected");
  return {
    ok: true,
    shippingInfo: { ...info },
    message: `Información de envío confirmada para ${info.fullName}`,
  };
}

// ── Payment link ────────────────────────────────────────────────────

export interface PaymentOrder {
  orderId: string;
  customerName: string;
  customerEmail: string;
  items: string[];
  totalAmount: number;
  discountCode?: string | null;
}

export interface PaymentLink extends PaymentOrder {
  paymentLink: string;
  amount: number;
  currency: "MXN";
  expiresIn: string;
  message: string;
}

export function generatePaymentLink(
  order: PaymentOrder,
  random: RandomInt = defaultRandom,
): PaymentLink {
  const checkoutId = `cs_test_${random(100000000000, 999999999999)}`;
  const paymentLink = `https://checkout.stripe.com/c/pay/${checkoutId}`;

  log.info("payment link generated", { orderId: order.orderId });

  return {
    ...order,
    discountCode: order.discountCode ?? null,
    paymentLink,
    amount: order.totalAmount,
    currency: "MXN",
    expiresIn: "24 horas",
    message: `Link de pago generado exitosamente para ${order.customerName}`,
  };
}
