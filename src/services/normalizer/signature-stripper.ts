/**
 * Signature block removal.
 *
 * @module services/normalizer/signature-stripper
 */

import { NORMALIZER_CONFIG } from '@/config/pipeline';

/**
 * Cuts the text at the first line that opens a signature ("--",
 * "Best regards", "Sent from my iPhone", ...). On longer texts a cut that
 * would drop more than 80% of the content is skipped.
 */
export function stripSignature(text: string): string {
  const lines = text.split('\n');
  const markerIndex = lines.findIndex((line) =>
    NORMALIZER_CONFIG.signatureMarkers.some((marker) => marker.test(line.trim()))
  );

  if (markerIndex === -1) return text;

  const kept = lines.slice(0, markerIndex).join('\n');
  const removedRatio = 1 - kept.trim().length / Math.max(text.trim().length, 1);

  if (
    text.length >= NORMALIZER_CONFIG.signatureRatioMinLength &&
    removedRatio > NORMALIZER_CONFIG.maxSignatureRemovalRatio
  ) {
    return text;
  }

  return kept;
}
