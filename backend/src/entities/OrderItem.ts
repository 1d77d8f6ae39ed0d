import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { decimalTransformer } from "./transformers.js";
// Import types only to avoid circular dependencies
import type { Order } from "./Order.js";
import type { MenuItem } from "./MenuItem.js";

@Entity("order_items")
export class OrderItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "integer", default: 1 })
  quantity!: number;

  // Captured when the line is created, never re-read from the menu
  @Column({ type: "decimal", precision: 10, scale: 2, transformer: decimalTransformer })
  price!: number;

  @Column({ type: "varchar", length: 200 })
  menu_item_name!: string;

  // Foreign keys
  @Column({ type: "integer" })
  order_id!: number;

  // Cleared when the menu item is deleted after the order ended
  @Column({ type: "integer", nullable: true })
  menu_item_id!: number | null;

  // Relationships - use string references to avoid circular dependencies
  @ManyToOne('Order', 'items', { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'order_id' })
  order!: Order;

  @ManyToOne('MenuItem', 'order_items', { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'menu_item_id' })
  menu_item!: MenuItem | null;
}
