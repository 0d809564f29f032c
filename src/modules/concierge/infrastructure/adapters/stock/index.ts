export { CartSimulationStockAdapter } from './cart-simulation-stock.adapter';
