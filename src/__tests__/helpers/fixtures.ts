/**
 * Test Fixtures
 * Restaurant pages and site route tables
 */

import { htmlProcessor } from '../../lib/processing';
import { ExtractionContext } from '../../lib/extraction';
import { FakeRouteTable } from './mocks';

export const TONYS = 'https://tonys.test';

export const tonysHome = `
<!DOCTYPE html>
<html>
<head><title>Tony's</title></head>
<body>
  <nav><a href="/menu">Menu</a> <a href="/contact">Contact</a></nav>
  <h1>Tony's</h1>
  <p class="address">123 Main St</p>
</body>
</html>
`;

export const tonysMenu = `
<!DOCTYPE html>
<html>
<head><title>Menu | Tony's</title></head>
<body>
  <h1>Our Menu</h1>
  <div class="menu-item"><span class="item-name">Pasta</span> <span class="price">$12</span></div>
  <div class="menu-item"><span class="item-name">Pizza</span> <span class="price">$14</span></div>
</body>
</html>
`;

export const tonysContact = `
<!DOCTYPE html>
<html>
<head><title>Contact | Tony's</title></head>
<body>
  <h1>Contact Us</h1>
  <p>Call us at <a href="tel:555-1234">555-1234</a></p>
</body>
</html>
`;

/**
 * Three-page restaurant site: home links to menu and contact
 */
export function tonysRoutes(origin: string = TONYS): FakeRouteTable {
  return {
    [`${origin}/`]: { body: tonysHome },
    [`${origin}/menu`]: { body: tonysMenu },
    [`${origin}/contact`]: { body: tonysContact },
  };
}

/**
 * Home page linking to `count` distinct pages (/page-1 … /page-N)
 */
export function linkFarmHome(count: number): string {
  const links = Array.from({ length: count }, (_, i) => `<li><a href="/page-${i + 1}">Page ${i + 1}</a></li>`);
  return `<html><head><title>Link Farm</title></head><body><ul>${links.join('')}</ul></body></html>`;
}

export function linkFarmRoutes(origin: string, count: number): FakeRouteTable {
  const routes: FakeRouteTable = {
    [`${origin}/`]: { body: linkFarmHome(count) },
  };
  for (let i = 1; i <= count; i++) {
    routes[`${origin}/page-${i}`] = { body: `<html><body><p>Page ${i}</p></body></html>` };
  }
  return routes;
}

/**
 * Extraction context the way the engine builds it
 */
export function buildExtractionContext(html: string, url: string = `${TONYS}/`): ExtractionContext {
  const processed = htmlProcessor.process(html);
  return { html, url, $: processed.$, text: processed.text };
}
