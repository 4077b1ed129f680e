import { z } from 'zod';

/**
 * Wire tokens exchanged with the serialization adapter: one element with its
 * attributes, its text payload (leaf elements only) and its child elements.
 * Namespace declarations are not attributes.
 */
export interface WireElement {
    readonly name: string;
    readonly attributes: Readonly<Record<string, string>>;
    readonly text?: string;
    readonly children: readonly WireElement[];
}

export const WireElementSchema: z.ZodType<WireElement> = z.lazy(() =>
    z.object({
        name: z.string().min(1),
        attributes: z.record(z.string()),
        text: z.string().optional(),
        children: z.array(WireElementSchema)
    })
);

export function wireElement(
    name: string,
    children: readonly WireElement[] = [],
    attributes: Readonly<Record<string, string>> = {},
    text?: string
): WireElement {
    return text === undefined ? { name, attributes, children } : { name, attributes, text, children };
}

/** Leaf element carrying only text. */
export function wireText(name: string, text: string, attributes: Readonly<Record<string, string>> = {}): WireElement {
    return { name, attributes, text, children: [] };
}
