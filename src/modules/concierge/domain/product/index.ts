export {
  isProduct,
  isProductList,
  isStockCheckedProduct,
  isStockCheckedProductList,
  productIdentityKey,
  type Product,
  type StockCheckedProduct,
} from './product';
