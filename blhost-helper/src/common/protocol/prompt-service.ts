import type { VariantCandidate } from './device-catalog';
import type { FlashRegionKey } from './flash-layout';

export type FlashSizeChoice =
  | { readonly kind: 'size'; readonly flashSize: string }
  | { readonly kind: 'full' };

/**
 * Interactive selections. Every method resolves to `undefined` when the user cancels or enters an invalid choice.
 */
export const PromptService = Symbol('PromptService');
export interface PromptService {
  selectVariant(
    category: string,
    candidates: readonly VariantCandidate[]
  ): Promise<string | undefined>;
  selectFlashRegion(): Promise<FlashRegionKey | undefined>;
  selectFlashSize(
    variant: string,
    flashSizes: readonly string[]
  ): Promise<FlashSizeChoice | undefined>;
}
