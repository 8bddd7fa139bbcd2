/**
 * Domain entities - exports all entities
 */

export * from './Session';
