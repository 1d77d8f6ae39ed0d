import { Category } from "./Category.js";
import { MenuItem } from "./MenuItem.js";
import { DiningTable } from "./DiningTable.js";
import { Order } from "./Order.js";
import { OrderItem } from "./OrderItem.js";

export { Category, MenuItem, DiningTable, Order, OrderItem };

export const entities = [Category, MenuItem, DiningTable, Order, OrderItem];
