import { z, ZodTypeAny } from "zod";
import { ValidationError } from "../errors.js";
import { MAX_LINE_QUANTITY, OrderLineInput } from "../types/order.js";

/**
 * Parse a request payload, reporting the first zod issue as a ValidationError
 */
export function parseInput<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [first] = result.error.issues;
    throw new ValidationError(first?.message ?? "Invalid input", result.error.issues);
  }
  return result.data;
}

export const idParamSchema = z.coerce
  .number({ invalid_type_error: "Invalid id" })
  .int("Invalid id")
  .positive("Invalid id");

// Form checkboxes arrive as "on"; JSON clients send booleans
const checkbox = z
  .union([z.boolean(), z.enum(["true", "false", "on", "off", "1", "0"])])
  .transform((value) => value === true || value === "true" || value === "on" || value === "1");

// A blank form field is missing, not zero
const blankAsMissing = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

// decimal(10, 2)
const MAX_PRICE = 99999999.99;

const optionalText = z
  .string()
  .trim()
  .optional()
  .nullable()
  .transform((value) => (value ? value : null));

// ---- Categories ----

export const categoryInputSchema = z.object({
  name: z
    .string({ required_error: "Category name is required!" })
    .trim()
    .min(1, "Category name is required!")
    .max(100, "Category name must be at most 100 characters"),
  description: optionalText
});

export type CategoryInput = z.infer<typeof categoryInputSchema>;

// ---- Menu items ----

const menuItemFields = {
  name: z
    .string({ required_error: "Name is required" })
    .trim()
    .min(1, "Name is required")
    .max(200, "Name must be at most 200 characters"),
  description: z
    .string({ required_error: "Description is required" })
    .trim()
    .min(1, "Description is required"),
  price: z.preprocess(
    blankAsMissing,
    z.coerce
      .number({ invalid_type_error: "Price must be a number" })
      .min(0.01, "Price must be at least 0.01")
      .max(MAX_PRICE, `Price must be at most ${MAX_PRICE}`)
      .refine((value) => Math.abs(Math.round(value * 100) - value * 100) < 1e-6, "Price must be in whole cents")
  ),
  category_id: z.coerce
    .number({ invalid_type_error: "Please select a category" })
    .int("Please select a category")
    .positive("Please select a category"),
  is_available: checkbox,
  image_url: optionalText
};

export const menuItemInputSchema = z.object({
  ...menuItemFields,
  is_available: checkbox.default(true)
});

export const menuItemUpdateSchema = z.object(menuItemFields).partial();

export type MenuItemInput = z.infer<typeof menuItemInputSchema>;
export type MenuItemUpdate = z.infer<typeof menuItemUpdateSchema>;

// ---- Tables ----

const INVALID_TABLE_NUMBERS = "Please enter valid numbers for table number and capacity.";

const tableFields = {
  number: z.preprocess(
    blankAsMissing,
    z.coerce
      .number({ invalid_type_error: INVALID_TABLE_NUMBERS })
      .int(INVALID_TABLE_NUMBERS)
      .min(0, "Table number cannot be negative.")
      .max(1_000_000, INVALID_TABLE_NUMBERS)
  ),
  capacity: z.preprocess(
    blankAsMissing,
    z.coerce
      .number({ invalid_type_error: INVALID_TABLE_NUMBERS })
      .int(INVALID_TABLE_NUMBERS)
      .min(1, "Capacity must be between 1 and 20 guests.")
      .max(20, "Capacity must be between 1 and 20 guests.")
  )
};

export const tableInputSchema = z.object(tableFields);
export const tableUpdateSchema = z.object(tableFields).partial();

export type TableInput = z.infer<typeof tableInputSchema>;
export type TableUpdate = z.infer<typeof tableUpdateSchema>;

// ---- Orders ----

const quantitySchema = z.preprocess(
  blankAsMissing,
  z.coerce
    .number({ invalid_type_error: "Quantity must be a whole number of at least 1" })
    .int("Quantity must be a whole number of at least 1")
    .min(1, "Quantity must be a whole number of at least 1")
    .max(MAX_LINE_QUANTITY, `Quantity cannot exceed ${MAX_LINE_QUANTITY}`)
);

const orderLineSchema = z
  .object({
    id: z.coerce.number().int().positive().optional(),
    menu_item_id: z.coerce.number().int().positive().optional(),
    quantity: quantitySchema.default(1)
  })
  .transform((line, ctx): OrderLineInput => {
    const menuItemId = line.menu_item_id ?? line.id;
    if (menuItemId === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid order data: every item needs a menu item id" });
      return z.NEVER;
    }
    return { menuItemId, quantity: line.quantity };
  });

/**
 * The item list arrives either as an array (JSON clients) or as a
 * JSON-encoded string (the order form's hidden field)
 */
const orderItemsSchema = z
  .unknown()
  .transform((value, ctx): unknown => {
    if (value === undefined || value === null || value === "") return [];
    if (typeof value !== "string") return value;
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid order data: order_items is not valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(
    z
      .array(orderLineSchema, { invalid_type_error: "Invalid order data: order_items must be a list" })
      .min(1, "Please add at least one item to the order")
  );

const tableSelectionSchema = z.unknown().transform((value, ctx): number => {
  if (value === undefined || value === null || value === "") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Please select a table" });
    return z.NEVER;
  }
  const tableId = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(tableId) || tableId <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid table selection" });
    return z.NEVER;
  }
  return tableId;
});

export const createOrderSchema = z
  .object({
    customer_name: z
      .string({ required_error: "Customer name is required", invalid_type_error: "Customer name is required" })
      .trim()
      .min(1, "Customer name is required")
      .max(100, "Customer name must be at most 100 characters"),
    table_id: tableSelectionSchema,
    order_items: orderItemsSchema
  })
  .transform((body) => ({
    customerName: body.customer_name,
    tableId: body.table_id,
    items: body.order_items
  }));

export const addOrderItemSchema = z
  .object({
    menu_item_id: z.coerce
      .number({ required_error: "Please select a menu item", invalid_type_error: "Please select a menu item" })
      .int("Please select a menu item")
      .positive("Please select a menu item"),
    quantity: quantitySchema.default(1)
  })
  .transform((body) => ({ menuItemId: body.menu_item_id, quantity: body.quantity }));

export const updateStatusSchema = z.object({
  status: z.string({ required_error: "Status is required", invalid_type_error: "Invalid status!" }).trim()
});

export const orderListQuerySchema = z.object({
  status: z.string().optional()
});
