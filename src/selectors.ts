import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

/**
 * Selector strategies: for each field an ordered list of named, pure lookups.
 * The first rule that returns a non-empty value wins; its name is kept for diagnostics.
 */

export type SelectorRule = {
    readonly name: string;
    readonly extract: (scope: Cheerio<Element>, $: CheerioAPI) => string | null;
};

export type SelectorStrategy = readonly SelectorRule[];

export type StrategyHit = { value: string; rule: string };

// ===[ Utils ]===============================================================
export function cleanText(s: string | null | undefined): string {
    return (s ?? '').replace(/\s+/g, ' ').trim();
}

/** `scope` itself when the selector is empty, otherwise its descendants. */
function within(scope: Cheerio<Element>, selector: string): Cheerio<Element> {
    return selector ? scope.find(selector) : scope;
}

export function applyStrategy(
    strategy: SelectorStrategy,
    scope: Cheerio<Element>,
    $: CheerioAPI,
): StrategyHit | null {
    for (const rule of strategy) {
        const value = cleanText(rule.extract(scope, $));
        if (value) return { value, rule: rule.name };
    }
    return null;
}

// ===[ Rule builders ]=======================================================
/** Text of the first element matching `selector` that has any. */
export function textOf(name: string, selector: string): SelectorRule {
    return {
        name,
        extract: (scope, $) => {
            for (const el of within(scope, selector).toArray()) {
                const text = cleanText($(el).text());
                if (text) return text;
            }
            return null;
        },
    };
}

/** Attribute of the first element matching `selector` that carries it. */
export function attrOf(name: string, selector: string, attribute: string): SelectorRule {
    return {
        name,
        extract: (scope, $) => {
            for (const el of within(scope, selector).toArray()) {
                const value = $(el).attr(attribute)?.trim();
                if (value) return value;
            }
            return null;
        },
    };
}

/**
 * Text next to an icon: `<span><i class="fa fa-play"></i> 1.2M</span>` → "1.2M".
 * The icon's own text (ligature fonts put the icon name there) is removed.
 */
export function iconText(name: string, iconSelector: string): SelectorRule {
    return {
        name,
        extract: (scope, $) => {
            const icon = scope.find(iconSelector).first();
            if (!icon.length) return null;
            const parentText = cleanText(icon.parent().text());
            const iconOwn = cleanText(icon.text());
            return iconOwn ? cleanText(parentText.replace(iconOwn, '')) : parentText;
        },
    };
}

/** First element matching `selector` that is not inside `excludeAncestor`. */
export function firstOutside(
    scope: Cheerio<Element>,
    $: CheerioAPI,
    selector: string,
    excludeAncestor: string,
): Cheerio<Element> | null {
    for (const el of scope.find(selector).toArray()) {
        const candidate = $(el);
        if (!candidate.closest(excludeAncestor).length) return candidate;
    }
    return null;
}

export function rule(name: string, extract: SelectorRule['extract']): SelectorRule {
    return { name, extract };
}
