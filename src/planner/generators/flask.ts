/**
 * Flask service generator
 */

import { GeneratorContext, lit, oneLine } from './types';

export function generateFlask(ctx: GeneratorContext): string {
    const routes = ctx.routes.map(r => `@app.route(${lit(r.path)}, methods=[${lit(r.method)}])
def ${r.handler}():
    return jsonify({"status": "ok", "endpoint": ${lit(r.path)}, "method": ${lit(r.method)}})
`);

    return `# ${oneLine(ctx.name)}: ${oneLine(ctx.goal)}
import os

from flask import Flask, jsonify

app = Flask(${lit(ctx.name)})


${routes.join('\n\n')}${routes.length > 0 ? '\n\n' : ''}if __name__ == "__main__":
    app.run(host="0.0.0.0", port=int(os.environ.get("PORT", "${ctx.port}")))
`;
}
