import { Knex } from 'knex';
import { LOCOMOTIVE_STATUSES } from '../../shared/types';

export async function up(knex: Knex): Promise<void> {
  // Create locomotives table
  await knex.schema.createTable('locomotives', (table) => {
    table.string('id').primary();
    table.string('locomotiveId', 20).notNullable().unique();
    table.string('model', 50).notNullable();
    table.integer('manufacturingYear').notNullable();
    table.integer('operatingHours').notNullable().defaultTo(0);
    table.date('lastMaintenance');
    table.enum('currentStatus', [...LOCOMOTIVE_STATUSES]).notNullable().defaultTo('active');
    table.string('fleet', 20);
    table.datetime('createdAt').notNullable();
    table.datetime('updatedAt').notNullable();

    // Indexes
    table.index(['currentStatus']);
    table.index(['model']);
  });

  // Create predictions table
  await knex.schema.createTable('predictions', (table) => {
    table.string('id').primary();
    table.string('locomotiveId').notNullable().references('id').inTable('locomotives').onDelete('CASCADE');
    table.string('predictionType', 50).notNullable();
    table.integer('predictionPeriod').notNullable();
    table.float('riskScore').notNullable();
    table.enum('riskLevel', ['Low', 'Medium', 'High']).notNullable();
    table.text('predictionData').notNullable();
    table.text('recommendations').notNullable();
    table.boolean('isActive').notNullable().defaultTo(true);
    table.datetime('expiresAt').notNullable();
    table.datetime('createdAt').notNullable();
    table.datetime('updatedAt').notNullable();

    // Indexes
    table.index(['locomotiveId']);
    table.index(['isActive', 'createdAt']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('predictions');
  await knex.schema.dropTableIfExists('locomotives');
}
