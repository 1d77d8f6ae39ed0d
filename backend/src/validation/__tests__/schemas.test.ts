import { ValidationError } from "../../errors.js";
import {
  addOrderItemSchema,
  categoryInputSchema,
  createOrderSchema,
  idParamSchema,
  menuItemInputSchema,
  parseInput,
  tableInputSchema
} from "../schemas.js";

describe("validation schemas", () => {
  describe("createOrderSchema", () => {
    it("should accept a JSON-encoded item list from the order form", () => {
      const input = parseInput(createOrderSchema, {
        customer_name: " Ann ",
        table_id: "3",
        order_items: '[{"id": 7, "quantity": 2}, {"id": 9}]'
      });

      expect(input).toEqual({
        customerName: "Ann",
        tableId: 3,
        items: [
          { menuItemId: 7, quantity: 2 },
          { menuItemId: 9, quantity: 1 }
        ]
      });
    });

    it("should accept an item array with menu_item_id", () => {
      const input = parseInput(createOrderSchema, {
        customer_name: "Ann",
        table_id: 1,
        order_items: [{ menu_item_id: 4, quantity: 1 }]
      });
      expect(input.items).toEqual([{ menuItemId: 4, quantity: 1 }]);
    });

    it("should require a customer name", () => {
      expect(() =>
        parseInput(createOrderSchema, { customer_name: "  ", table_id: 1, order_items: [{ id: 1 }] })
      ).toThrow("Customer name is required");
    });

    it("should require a table", () => {
      expect(() =>
        parseInput(createOrderSchema, { customer_name: "Ann", table_id: "", order_items: [{ id: 1 }] })
      ).toThrow("Please select a table");
    });

    it("should reject a table id that is not a number", () => {
      expect(() =>
        parseInput(createOrderSchema, { customer_name: "Ann", table_id: "abc", order_items: [{ id: 1 }] })
      ).toThrow("Invalid table selection");
    });

    it("should reject item data that is not JSON", () => {
      expect(() =>
        parseInput(createOrderSchema, { customer_name: "Ann", table_id: 1, order_items: "[{id:" })
      ).toThrow("Invalid order data: order_items is not valid JSON");
    });

    it("should reject an empty item list", () => {
      expect(() =>
        parseInput(createOrderSchema, { customer_name: "Ann", table_id: 1, order_items: "[]" })
      ).toThrow("Please add at least one item to the order");
    });

    it("should reject a zero quantity", () => {
      expect(() =>
        parseInput(createOrderSchema, { customer_name: "Ann", table_id: 1, order_items: [{ id: 1, quantity: 0 }] })
      ).toThrow("Quantity must be a whole number of at least 1");
    });
  });

  it("should raise ValidationError carrying the zod issues", () => {
    try {
      parseInput(categoryInputSchema, { name: "" });
      throw new Error("expected a validation error");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty("message", "Category name is required!");
      expect(error).toHaveProperty("statusCode", 400);
    }
  });

  it("should default menu items to available and read form checkboxes", () => {
    const base = { name: "Curry", description: "House curry", price: "12.50", category_id: "2" };

    expect(parseInput(menuItemInputSchema, base)).toEqual({
      name: "Curry",
      description: "House curry",
      price: 12.5,
      category_id: 2,
      is_available: true,
      image_url: null
    });
    expect(parseInput(menuItemInputSchema, { ...base, is_available: "off" }).is_available).toBe(false);
  });

  it("should reject a price below one cent", () => {
    expect(() =>
      parseInput(menuItemInputSchema, { name: "Curry", description: "x", price: 0, category_id: 1 })
    ).toThrow("Price must be at least 0.01");
  });

  it("should only accept prices in whole cents", () => {
    const curry = { name: "Curry", description: "x", category_id: 1 };

    expect(() => parseInput(menuItemInputSchema, { ...curry, price: "1.005" })).toThrow("Price must be in whole cents");
    expect(parseInput(menuItemInputSchema, { ...curry, price: "0.29" }).price).toBe(0.29);
  });

  it("should cap prices at what the price column holds", () => {
    expect(() =>
      parseInput(menuItemInputSchema, { name: "Curry", description: "x", price: 100000000, category_id: 1 })
    ).toThrow("Price must be at most 99999999.99");
  });

  it("should treat blank number fields as missing", () => {
    expect(() => parseInput(tableInputSchema, { number: "", capacity: "4" })).toThrow(
      "Please enter valid numbers for table number and capacity."
    );
    expect(() => parseInput(menuItemInputSchema, { name: "Curry", description: "x", price: " ", category_id: 1 })).toThrow(
      "Price must be a number"
    );
    expect(() => parseInput(addOrderItemSchema, { menu_item_id: 5, quantity: "" })).toThrow(
      "Quantity must be a whole number of at least 1"
    );
  });

  it("should cap the quantity of a line", () => {
    expect(() => parseInput(addOrderItemSchema, { menu_item_id: 5, quantity: 1000 })).toThrow(
      "Quantity cannot exceed 999"
    );
    expect(parseInput(addOrderItemSchema, { menu_item_id: 5, quantity: "999" })).toEqual({ menuItemId: 5, quantity: 999 });
  });

  it("should bound table capacity", () => {
    expect(() => parseInput(tableInputSchema, { number: 1, capacity: 21 })).toThrow(
      "Capacity must be between 1 and 20 guests."
    );
    expect(() => parseInput(tableInputSchema, { number: -1, capacity: 2 })).toThrow(
      "Table number cannot be negative."
    );
    expect(parseInput(tableInputSchema, { number: "0", capacity: "4" })).toEqual({ number: 0, capacity: 4 });
  });

  it("should default the added quantity to one", () => {
    expect(parseInput(addOrderItemSchema, { menu_item_id: "5" })).toEqual({ menuItemId: 5, quantity: 1 });
  });

  it("should reject an id that is not a positive integer", () => {
    expect(() => parseInput(idParamSchema, "abc")).toThrow("Invalid id");
    expect(parseInput(idParamSchema, "12")).toBe(12);
  });
});
