import { describe, expect, it } from "vitest";
import { calculate } from "../calculator";
import {
  collectShippingInfo,
  generateDiscountCode,
  generatePaymentLink,
  processPurchaseAssistance,
  productLink,
  type RandomInt,
  type ShippingInfo,
} from "../sales";

const lowest: RandomInt = (min) => min;
const highest: RandomInt = (_min, max) => max;

const SHIPPING: ShippingInfo = {
  fullName: "Ana López",
  email: "ana@example.com",
  phone: "5512345678",
  address: "Av. Reforma 100",
  city: "CDMX",
  state: "CDMX",
  postalCode: "06600",
};

describe("generateDiscountCode", () => {
  it("gives an earned discount between 10 and 19 percent", () => {
    expect(generateDiscountCode("David", true, lowest)).toEqual({
      code: "FORTUNA10-DAV1000",
      discountPercentage: 10,
      earned: true,
      message:
        "¡Código especial generado! Usa FORTUNA10-DAV1000 para obtener 10% de descuento en tu compra.",
    });
    expect(generateDiscountCode("María", true, highest).code).toBe("FORTUNA19-MAR9999");
  });

  it("gives a flat 5 percent when not earned", () => {
    const discount = generateDiscountCode("Cliente", false, lowest);
    expect(discount.code).toBe("FORTUNA5-VIP1000");
    expect(discount.discountPercentage).toBe(5);
  });

  it("stays in range with real randomness", () => {
    const { code, discountPercentage } = generateDiscountCode();
    expect(discountPercentage).toBeGreaterThanOrEqual(10);
    expect(discountPercentage).toBeLessThanOrEqual(19);
    expect(code).toMatch(/^FORTUNA1\d-VIP\d{4}$/);
  });
});

describe("processPurchaseAssistance", () => {
  it("builds an order with a link per beer", () => {
    const order = processPurchaseAssistance(
      "Ana",
      ["Ippolita", "NEIPPOLITA 6-pack", "Hazy Pale Ale", "Lager X"],
      null,
      lowest,
    );

    expect(order).toEqual({
      orderId: "FORT-10000",
      beers: ["Ippolita", "NEIPPOLITA 6-pack", "Hazy Pale Ale", "Lager X"],
      purchaseLinks: {
        Ippolita: "https://cervezafortuna.com/producto/ippolita/",
        "NEIPPOLITA 6-pack": "https://cervezafortuna.com/producto/neippolita/",
        "Hazy Pale Ale": "https://cervezafortuna.com/producto/hazy-pale-ale/",
        "Lager X": "https://cervezafortuna.com/inicio/cervezas/",
      },
      totalItems: 4,
      discountApplied: false,
      discountCode: null,
      message: "¡Perfecto, Ana! Tu pedido está listo para procesar.",
    });
  });

  it("marks the discount as applied when a code is given", () => {
    const order = processPurchaseAssistance("Ana", ["Oat Stout"], "FORTUNA12-ANA1234", highest);
    expect(order.orderId).toBe("FORT-99999");
    expect(order.discountApplied).toBe(true);
    expect(order.discountCode).toBe("FORTUNA12-ANA1234");
  });

  it("matches product pages by name", () => {
    expect(productLink("Pale Ale")).toBe("https://cervezafortuna.com/producto/pale-ale/");
    expect(productLink("Sake Ale")).toBe("https://cervezafortuna.com/producto/sake-ale/");
  });
});

describe("collectShippingInfo", () => {
  it("confirms complete information", () => {
    expect(collectShippingInfo(SHIPPING)).toEqual({
      ok: true,
      shippingInfo: SHIPPING,
      message: "Información de envío confirmada para Ana López",
    });
  });

  it("rejects an invalid email", () => {
    expect(collectShippingInfo({ ...SHIPPING, email: "ana.example.com" })).toEqual({
      ok: false,
      error: "Email inválido",
      message: "Por favor proporciona un email válido",
    });
  });

  it("checks fields in order", () => {
    const result = collectShippingInfo({ ...SHIPPING, fullName: "Al", phone: "123" });
    expect(result.ok).toBe(false);
    expect(result.message).toBe("El nombre debe tener al menos 3 caracteres");

    const phone = collectShippingInfo({ ...SHIPPING, phone: "123" });
    expect(phone.message).toBe("El teléfono debe tener al menos 10 dígitos");

    const address = collectShippingInfo({ ...SHIPPING, address: "Av" });
    expect(address.message).toBe("Por favor proporciona una dirección completa");
  });
});

describe("generatePaymentLink", () => {
  it("builds a checkout link in MXN", () => {
    const link = generatePaymentLink(
      {
        orderId: "FORT-10000",
        customerName: "Ana López",
        customerEmail: "ana@example.com",
        items: ["Oat Stout"],
        totalAmount: 428.4,
      },
      lowest,
    );

    expect(link).toEqual({
      orderId: "FORT-10000",
      customerName: "Ana López",
      customerEmail: "ana@example.com",
      items: ["Oat Stout"],
      totalAmount: 428.4,
      discountCode: null,
      paymentLink: "https://checkout.stripe.com/c/pay/cs_test_100000000000",
      amount: 428.4,
      currency: "MXN",
      expiresIn: "24 horas",
      message: "Link de pago generado exitosamente para Ana López",
    });
  });
});

describe("calculate", () => {
  it("applies a discount", () => {
    expect(calculate("504 * (1 - 15/100)")).toEqual({
      ok: true,
      expression: "504 * (1 - 15/100)",
      result: 428.4,
    });
  });

  it("reports syntax errors", () => {
    expect(calculate("2 +").ok).toBe(false);
  });

  it("rejects empty and non-numeric results", () => {
    expect(calculate("  ")).toEqual({ ok: false, expression: "  ", error: "Empty expression" });
    expect(calculate("1/0")).toEqual({
      ok: false,
      expression: "1/0",
      error: "Expression did not produce a finite number",
    });
  });
});
