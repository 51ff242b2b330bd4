/**
 * In-Memory Adapters
 * Test doubles for the output ports, no AWS or terminal involved
 */
export { InMemoryObjectStoreAdapter, type StoreCall } from './in-memory-object-store.adapter';
export { FixedCredentialSource, FixedCredentialPrompt } from './fixed-credential.adapters';
