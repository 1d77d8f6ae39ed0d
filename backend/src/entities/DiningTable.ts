import { Entity, PrimaryGeneratedColumn, Column, OneToMany } from "typeorm";
import type { Order } from "./Order.js";

@Entity("dining_tables")
export class DiningTable {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "integer", unique: true })
  number!: number;

  @Column({ type: "integer" })
  capacity!: number;

  // Owned by the order workflow: true while an active order exists
  @Column({ type: "boolean", default: false })
  is_occupied!: boolean;

  @OneToMany('Order', 'table')
  orders!: Order[];
}
