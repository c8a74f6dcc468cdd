/**
 * Placeholder script for languages without a generator.
 * Lists every action as unimplemented.
 */

import { formatAction } from '../../parser/action_grammar';
import { GeneratorContext, oneLine } from './types';

function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function generatePlaceholder(ctx: GeneratorContext): string {
    const lines = [
        '#!/bin/sh',
        `# No generator for language ${shellQuote(oneLine(ctx.language))}`,
        `echo ${shellQuote(`Intent: ${ctx.name}`)}`,
        `echo ${shellQuote(`Goal: ${ctx.goal}`)}`,
    ];
    for (const action of ctx.actions) {
        lines.push(`echo ${shellQuote(`UNIMPLEMENTED: ${formatAction(action)}`)}`);
    }
    return lines.join('\n') + '\n';
}
