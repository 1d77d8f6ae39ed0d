import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, OneToMany, JoinColumn } from "typeorm";
import { decimalTransformer } from "./transformers.js";
// Import types only for type checking, not for runtime
import type { Category } from "./Category.js";
import type { OrderItem } from "./OrderItem.js";

@Entity("menu_items")
export class MenuItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar", length: 200 })
  name!: string;

  @Column({ type: "text" })
  description!: string;

  @Column({ type: "decimal", precision: 10, scale: 2, transformer: decimalTransformer })
  price!: number;

  @Column({ type: "boolean", default: true })
  is_available!: boolean;

  @Column({ type: "varchar", length: 500, nullable: true })
  image_url!: string | null;

  @CreateDateColumn()
  created_at!: Date;

  // Foreign key
  @Column({ type: "integer" })
  category_id!: number;

  // Relationships - use string reference to avoid circular dependency
  @ManyToOne('Category', 'menu_items', { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'category_id' })
  category!: Category;

  @OneToMany('OrderItem', 'menu_item')
  order_items!: OrderItem[];
}
