import type { Product } from '../../domain/product';

export interface CarouselCard {
  name: string;
  price: number | null;
  listPrice: number | null;
  imageUrl: string;
  link: string;
}

export function buildCarouselCards(products: readonly Product[], maxItems: number): CarouselCard[] {
  return products.slice(0, Math.max(0, maxItems)).map((product) => ({
    name: product.skuName || product.name,
    price: product.price,
    listPrice: product.listPrice,
    imageUrl: product.imageUrl,
    link: product.link,
  }));
}

export function formatPrice(
  price: number | null,
  listPrice: number | null,
  currencySymbol: string,
): string {
  if (!price) {
    return 'Price not available';
  }

  const current = formatAmount(price, currencySymbol);
  if (listPrice && listPrice > price) {
    return `${current} (from ${formatAmount(listPrice, currencySymbol)})`;
  }

  return current;
}

function formatAmount(amount: number, currencySymbol: string): string {
  return `${currencySymbol} ${amount.toFixed(2).replace('.', ',')}`;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function formatImage(imageUrl: string): string {
  if (imageUrl.length === 0) {
    return '';
  }

  const altText = imageUrl.split('/').pop() || 'product';
  return `![${altText}](${imageUrl})`;
}

/** Carousel message body understood by the broadcast channel. */
export function renderCarousel(cards: readonly CarouselCard[], currencySymbol: string): string {
  const items = cards.map((card) => {
    const name = escapeXml(card.name);
    return [
      '<carousel-item>',
      `  <name>${name}</name>`,
      `  <price>${escapeXml(formatPrice(card.price, card.listPrice, currencySymbol))}</price>`,
      `  <description>${name}</description>`,
      `  <product_link>${escapeXml(card.link)}</product_link>`,
      `  <image>${escapeXml(formatImage(card.imageUrl))}</image>`,
      '</carousel-item>',
    ].join('\n');
  });

  return ['<?xml version="1.0" encoding="UTF-8" ?>', ...items].join('\n');
}
