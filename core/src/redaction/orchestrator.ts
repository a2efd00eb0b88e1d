import type { AnnotationStore } from '../document/annotation-store.js';
import { WarningCode } from '../errors/index.js';
import { createInterval, type Interval } from '../interval.js';
import { createLogger, type Logger } from '../logger.js';
import { containsRedactionMarkup, redactMarkup } from '../markup/redactor.js';

export const DEFAULT_INTERVAL_TIER = 'Postprocess';

export interface RedactDocumentOptions {
  /** Tier whose annotations mark the media spans to silence or blur */
  intervalTier?: string;
  /** Apply the markup redactor to annotation values (default true) */
  redactText?: boolean;
  logger?: Logger;
}

export interface RedactedAnnotation {
  tierId: string;
  annotationId: string;
  value: string;
}

export interface RedactDocumentResult {
  /** Annotations whose value was replaced, in document order */
  redacted: RedactedAnnotation[];
  /** Media intervals from the interval tier, in document order, never merged */
  intervals: Interval<string>[];
}

/**
 * Redact markup in every annotation of `store`, in place, and collect the
 * media intervals marked on the interval tier.
 *
 * The two outputs are independent: intervals come only from the interval
 * tier, whatever the text redaction changed.
 */
export function redactDocument(
  store: AnnotationStore,
  options: RedactDocumentOptions = {},
): RedactDocumentResult {
  const logger = options.logger ?? createLogger();
  const intervalTier = options.intervalTier ?? DEFAULT_INTERVAL_TIER;

  const redacted: RedactedAnnotation[] = [];
  if (options.redactText ?? true) {
    for (const tier of store.document.tiers) {
      for (const annotation of tier.annotations) {
        if (!containsRedactionMarkup(annotation.value)) {
          continue;
        }
        const result = redactMarkup(annotation.value);
        if (!result.changed) {
          continue;
        }
        annotation.value = result.text;
        redacted.push({ tierId: tier.id, annotationId: annotation.id, value: result.text });
        logger.debug('redaction.annotation', { tier: tier.id, annotationId: annotation.id });
      }
    }
  }

  let intervals: Interval<string>[] = [];
  if (store.getTier(intervalTier)) {
    intervals = store
      .annotationsOf(intervalTier)
      .map((span) => createInterval(span.start, span.end, span.value));
  } else {
    logger.warn(`[${WarningCode.INTERVAL_TIER_MISSING}] No "${intervalTier}" tier; media will not be redacted.`);
  }

  logger.info(`Redacted ${redacted.length} annotation(s); ${intervals.length} media interval(s).`);
  return { redacted, intervals };
}
