import { MigrationInterface, QueryRunner, TableIndex } from "typeorm";

export class AddValidationConstraints1000000000001 implements MigrationInterface {
    name = 'AddValidationConstraints1000000000001'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`
            ALTER TABLE "orders"
            ADD CONSTRAINT "chk_order_status"
            CHECK (status IN ('pending', 'preparing', 'ready', 'delivered', 'cancelled'))
        `);

        await queryRunner.query(`
            ALTER TABLE "order_items"
            ADD CONSTRAINT "chk_quantity_positive"
            CHECK (quantity > 0)
        `);

        await queryRunner.query(`
            ALTER TABLE "menu_items"
            ADD CONSTRAINT "chk_price_positive"
            CHECK (price > 0)
        `);

        await queryRunner.query(`
            ALTER TABLE "dining_tables"
            ADD CONSTRAINT "chk_capacity_range"
            CHECK (capacity BETWEEN 1 AND 20)
        `);

        // Indexes for the guard and listing queries
        await queryRunner.createIndex("orders", new TableIndex({
            name: "idx_orders_table_id_status",
            columnNames: ["table_id", "status"]
        }));

        await queryRunner.createIndex("orders", new TableIndex({
            name: "idx_orders_created_at",
            columnNames: ["created_at"]
        }));

        await queryRunner.createIndex("order_items", new TableIndex({
            name: "idx_order_items_order_id",
            columnNames: ["order_id"]
        }));

        await queryRunner.createIndex("order_items", new TableIndex({
            name: "idx_order_items_menu_item_id",
            columnNames: ["menu_item_id"]
        }));

        await queryRunner.createIndex("menu_items", new TableIndex({
            name: "idx_menu_items_category_id",
            columnNames: ["category_id"]
        }));
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.dropIndex("menu_items", "idx_menu_items_category_id");
        await queryRunner.dropIndex("order_items", "idx_order_items_menu_item_id");
        await queryRunner.dropIndex("order_items", "idx_order_items_order_id");
        await queryRunner.dropIndex("orders", "idx_orders_created_at");
        await queryRunner.dropIndex("orders", "idx_orders_table_id_status");
        await queryRunner.query(`ALTER TABLE "dining_tables" DROP CONSTRAINT "chk_capacity_range"`);
        await queryRunner.query(`ALTER TABLE "menu_items" DROP CONSTRAINT "chk_price_positive"`);
        await queryRunner.query(`ALTER TABLE "order_items" DROP CONSTRAINT "chk_quantity_positive"`);
        await queryRunner.query(`ALTER TABLE "orders" DROP CONSTRAINT "chk_order_status"`);
    }
}
