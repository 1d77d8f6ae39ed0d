import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, OneToMany } from "typeorm";
// Import types only to avoid circular dependencies
import type { MenuItem } from "./MenuItem.js";

@Entity("categories")
export class Category {
  @PrimaryGeneratedColumn()
  id!: number;

  // Uniqueness is checked by CatalogService, not by the schema
  @Column({ type: "varchar", length: 100 })
  name!: string;

  @Column({ type: "text", nullable: true })
  description!: string | null;

  @CreateDateColumn()
  created_at!: Date;

  @OneToMany('MenuItem', 'category')
  menu_items!: MenuItem[];
}
