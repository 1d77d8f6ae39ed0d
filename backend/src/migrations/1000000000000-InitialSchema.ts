import { MigrationInterface, QueryRunner, Table, TableForeignKey } from "typeorm";

export class InitialSchema1000000000000 implements MigrationInterface {
    name = 'InitialSchema1000000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.createTable(new Table({
            name: "categories",
            columns: [
                { name: "id", type: "integer", isPrimary: true, isGenerated: true, generationStrategy: "increment" },
                { name: "name", type: "varchar", length: "100", isNullable: false },
                { name: "description", type: "text", isNullable: true },
                { name: "created_at", type: "timestamp", default: "CURRENT_TIMESTAMP" }
            ]
        }), true);

        await queryRunner.createTable(new Table({
            name: "menu_items",
            columns: [
                { name: "id", type: "integer", isPrimary: true, isGenerated: true, generationStrategy: "increment" },
                { name: "name", type: "varchar", length: "200", isNullable: false },
                { name: "description", type: "text", isNullable: false },
                { name: "price", type: "decimal", precision: 10, scale: 2, isNullable: false },
                { name: "is_available", type: "boolean", default: true },
                { name: "image_url", type: "varchar", length: "500", isNullable: true },
                { name: "category_id", type: "integer", isNullable: false },
                { name: "created_at", type: "timestamp", default: "CURRENT_TIMESTAMP" }
            ]
        }), true);

        await queryRunner.createTable(new Table({
            name: "dining_tables",
            columns: [
                { name: "id", type: "integer", isPrimary: true, isGenerated: true, generationStrategy: "increment" },
                { name: "number", type: "integer", isNullable: false, isUnique: true },
                { name: "capacity", type: "integer", isNullable: false },
                { name: "is_occupied", type: "boolean", default: false }
            ]
        }), true);

        await queryRunner.createTable(new Table({
            name: "orders",
            columns: [
                { name: "id", type: "integer", isPrimary: true, isGenerated: true, generationStrategy: "increment" },
                { name: "customer_name", type: "varchar", length: "100", isNullable: false },
                { name: "status", type: "varchar", length: "20", isNullable: false, default: "'pending'" },
                { name: "total_amount", type: "decimal", precision: 10, scale: 2, default: 0 },
                { name: "table_id", type: "integer", isNullable: false },
                { name: "created_at", type: "timestamp", default: "CURRENT_TIMESTAMP" },
                { name: "updated_at", type: "timestamp", default: "CURRENT_TIMESTAMP" }
            ]
        }), true);

        await queryRunner.createTable(new Table({
            name: "order_items",
            columns: [
                { name: "id", type: "integer", isPrimary: true, isGenerated: true, generationStrategy: "increment" },
                { name: "quantity", type: "integer", isNullable: false, default: 1 },
                { name: "price", type: "decimal", precision: 10, scale: 2, isNullable: false },
                { name: "menu_item_name", type: "varchar", length: "200", isNullable: false },
                { name: "order_id", type: "integer", isNullable: false },
                { name: "menu_item_id", type: "integer", isNullable: true }
            ]
        }), true);

        await queryRunner.createForeignKey("menu_items", new TableForeignKey({
            columnNames: ["category_id"],
            referencedColumnNames: ["id"],
            referencedTableName: "categories",
            onDelete: "RESTRICT"
        }));

        await queryRunner.createForeignKey("orders", new TableForeignKey({
            columnNames: ["table_id"],
            referencedColumnNames: ["id"],
            referencedTableName: "dining_tables",
            onDelete: "RESTRICT"
        }));

        await queryRunner.createForeignKey("order_items", new TableForeignKey({
            columnNames: ["order_id"],
            referencedColumnNames: ["id"],
            referencedTableName: "orders",
            onDelete: "CASCADE"
        }));

        // Historical lines keep their captured name and price
        await queryRunner.createForeignKey("order_items", new TableForeignKey({
            columnNames: ["menu_item_id"],
            referencedColumnNames: ["id"],
            referencedTableName: "menu_items",
            onDelete: "SET NULL"
        }));
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        // Drop tables in reverse order to handle foreign key constraints
        await queryRunner.dropTable("order_items");
        await queryRunner.dropTable("orders");
        await queryRunner.dropTable("dining_tables");
        await queryRunner.dropTable("menu_items");
        await queryRunner.dropTable("categories");
    }
}
