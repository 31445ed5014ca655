import { Page, Locator } from 'playwright';
import { HUMAN_CONFIG } from '../config.js';

/**
 * Human-paced input helpers for driving the live session
 */

// Random number between min and max
export function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

// Fixed wait that ends early once the run is aborted
export function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// Random delay between actions
export async function humanDelay(
  min = HUMAN_CONFIG.minActionDelay,
  max = HUMAN_CONFIG.maxActionDelay
): Promise<void> {
  await pause(randomBetween(min, max));
}

// Bezier curve for natural mouse movement
function bezierPoint(
  t: number,
  p0: number,
  p1: number,
  p2: number,
  p3: number
): number {
  const u = 1 - t;
  return u * u * u * p0 + 3 * u * u * t * p1 + 3 * u * t * t * p2 + t * t * t * p3;
}

function generateBezierPath(
  startX: number,
  startY: number,
  endX: number,
  endY: number,
  steps: number
): Array<{ x: number; y: number }> {
  const points: Array<{ x: number; y: number }> = [];

  const cp1x = startX + (endX - startX) * 0.25 + randomBetween(-50, 50);
  const cp1y = startY + (endY - startY) * 0.1 + randomBetween(-30, 30);
  const cp2x = startX + (endX - startX) * 0.75 + randomBetween(-50, 50);
  const cp2y = startY + (endY - startY) * 0.9 + randomBetween(-30, 30);

  for (let i = 0; i <= steps; i++) {
    const t = i / steps;
    points.push({
      x: bezierPoint(t, startX, cp1x, cp2x, endX),
      y: bezierPoint(t, startY, cp1y, cp2y, endY),
    });
  }

  return points;
}

async function humanMove(page: Page, targetX: number, targetY: number): Promise<void> {
  // A CDP-attached page often reports no viewport; start from a fixed point then
  const viewport = page.viewportSize();
  const startX = viewport ? viewport.width / 2 : 500;
  const startY = viewport ? viewport.height / 2 : 300;

  const path = generateBezierPath(startX, startY, targetX, targetY, HUMAN_CONFIG.mouseMovementSteps);

  for (const point of path) {
    await page.mouse.move(point.x, point.y);
    await pause(randomBetween(5, 15));
  }
}

// Move to the element and click near its center. Falls back to a plain
// click when the element has no box (detached or inside a closed overlay).
export async function humanClick(page: Page, locator: Locator): Promise<void> {
  await locator.scrollIntoViewIfNeeded();
  const box = await locator.boundingBox();
  if (!box) {
    await locator.click();
    return;
  }

  const offsetX = randomBetween(-Math.floor(box.width * 0.2), Math.floor(box.width * 0.2));
  const offsetY = randomBetween(-Math.floor(box.height * 0.2), Math.floor(box.height * 0.2));
  const clickX = box.x + box.width / 2 + offsetX;
  const clickY = box.y + box.height / 2 + offsetY;

  await humanMove(page, clickX, clickY);
  await humanDelay(80, 200);
  await page.mouse.click(clickX, clickY);
  await humanDelay(150, 350);
}

// Replace the field's content, typing the new value key by key
export async function humanType(locator: Locator, text: string, delayMs: number): Promise<void> {
  await locator.fill('');
  await locator.pressSequentially(text, { delay: delayMs });
}
