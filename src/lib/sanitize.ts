/* ===================================================================
 * HTML Sanitiser — allowlist-based.
 * Keeps the tags Markdown rendering produces; strips the rest.
 * =================================================================== */

const ALLOWED_TAGS = new Set([
    'p', 'br', 'hr', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
    'ul', 'ol', 'li', 'blockquote', 'pre', 'code',
    'em', 'strong', 'b', 'i', 'del', 'sub', 'sup',
    'a', 'table', 'thead', 'tbody', 'tr', 'th', 'td',
]);

// Removed together with everything inside them.
const DROPPED_TAGS = new Set(['script', 'style', 'iframe', 'object', 'embed', 'template', 'noscript']);

const ALLOWED_ATTRS: Record<string, Set<string>> = {
    a: new Set(['href', 'title']),
    ol: new Set(['start']),
    code: new Set(['class']),
    td: new Set(['align']),
    th: new Set(['align']),
};

const SAFE_SCHEMES = new Set(['http:', 'https:', 'mailto:']);
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const CODE_CLASS = /^language-[\w+#.-]+$/;

/**
 * Sanitise an HTML string by keeping only allowed tags/attributes.
 * Needs a DOMParser (browser page or jsdom).
 */
export function sanitizeHtml(dirtyHtml: string): string {
    const parser = new DOMParser();
    const doc = parser.parseFromString(dirtyHtml, 'text/html');
    cleanNode(doc.body);
    return doc.body.innerHTML;
}

/**
 * Allow http(s), mailto, fragments and scheme-less relative URLs.
 * Browsers ignore control characters and whitespace inside a scheme,
 * so those are stripped before the check.
 */
export function isSafeHref(href: string): boolean {
    const compact = href.replace(/[\u0000-\u0020\u007f]/g, '');
    const scheme = URL_SCHEME.exec(compact);
    return scheme === null || SAFE_SCHEMES.has(scheme[0].toLowerCase());
}

function cleanNode(node: Node): void {
    const toRemove: Node[] = [];

    Array.from(node.childNodes).forEach(child => {
        if (child instanceof Element) {
            const tag = child.tagName.toLowerCase();

            if (DROPPED_TAGS.has(tag)) {
                toRemove.push(child);
                return;
            }

            if (!ALLOWED_TAGS.has(tag)) {
                // Unwrap: clean the children first, then lift them out
                cleanNode(child);
                while (child.firstChild) {
                    child.parentNode?.insertBefore(child.firstChild, child);
                }
                toRemove.push(child);
                return;
            }

            const allowed = ALLOWED_ATTRS[tag] ?? new Set<string>();
            for (const attr of Array.from(child.attributes)) {
                if (!allowed.has(attr.name)) {
                    child.removeAttribute(attr.name);
                }
            }

            if (tag === 'a') {
                const href = child.getAttribute('href') ?? '';
                if (!isSafeHref(href)) {
                    child.setAttribute('href', '#');
                }
                child.setAttribute('rel', 'noopener noreferrer');
                child.setAttribute('target', '_blank');
            }

            if (tag === 'code') {
                const cls = child.getAttribute('class');
                if (cls !== null && !CODE_CLASS.test(cls)) {
                    child.removeAttribute('class');
                }
            }

            cleanNode(child);
        } else if (child.nodeType === Node.COMMENT_NODE) {
            toRemove.push(child);
        }
    });

    toRemove.forEach(n => n.parentNode?.removeChild(n));
}
