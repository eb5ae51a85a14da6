/**
 * Cart Module Public API
 * Exports the module's public interface following hexagonal architecture
 */
export {
  createCartHttpAdapter,
  createCartModule,
  type CartPort,
  type CartRequestContext,
  type CartResult,
} from "./cart.module.js";
