/**
 * Account Service - Base DynamoDB Schema Types
 *
 * Foundation interfaces for Single Table Design.
 *
 * Key Design:
 * - PK (Partition Key): Entity-specific prefix pattern (e.g., USER#<id>)
 * - SK (Sort Key): Entity type identifier (PROFILE, USER)
 * - GSI1: Secondary access pattern (user lookup by email)
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

// =============================================================================
// Key Pattern Prefixes (Strict Typing)
// =============================================================================

/** Partition Key prefixes for each entity type */
export type PKPrefix =
    | `USER#${string}`
    | `EMAIL#${string}`;

/** Sort Key values */
export type SKValue = 'PROFILE' | 'USER';

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType =
    | 'USER'
    | 'EMAIL_LOCK';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items in the Single Table Design.
 */
export interface BaseItem {
    /** Partition Key - Entity-specific prefix pattern */
    PK: PKPrefix;
    /** Sort Key - Entity type identifier */
    SK: SKValue;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** ISO 8601 creation timestamp */
    createdAt: string;
}
