import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToMany, JoinColumn } from "typeorm";
import { OrderStatus } from "../types/order.js";
import { decimalTransformer } from "./transformers.js";
// Use type imports to avoid circular dependencies
import type { DiningTable } from "./DiningTable.js";
import type { OrderItem } from "./OrderItem.js";

@Entity("orders")
export class Order {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 100 })
  customer_name!: string;

  @Column({ type: "varchar", length: 20, default: OrderStatus.PENDING })
  status!: OrderStatus;

  /**
   * Always the sum of quantity * price over `items`; written only by
   * OrderService after re-aggregating.
   */
  @Column({ type: "decimal", precision: 10, scale: 2, default: 0, transformer: decimalTransformer })
  total_amount!: number;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;

  // Foreign keys
  @Column({ type: "integer" })
  table_id!: number;

  // Relationships
  @ManyToOne('DiningTable', 'orders', { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'table_id' })
  table!: DiningTable;

  @OneToMany('OrderItem', 'order')
  items!: OrderItem[];
}
