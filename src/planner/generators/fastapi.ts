/**
 * FastAPI service generator
 */

import { GeneratorContext, lit, oneLine } from './types';

export function generateFastApi(ctx: GeneratorContext): string {
    const routes = ctx.routes.map(r => `@app.${r.method.toLowerCase()}(${lit(r.path)})
async def ${r.handler}():
    return {"status": "ok", "endpoint": ${lit(r.path)}, "method": ${lit(r.method)}}
`);

    return `# ${oneLine(ctx.name)}: ${oneLine(ctx.goal)}
import os

from fastapi import FastAPI

app = FastAPI(title=${lit(ctx.name)}, description=${lit(ctx.goal)})


${routes.join('\n\n')}${routes.length > 0 ? '\n\n' : ''}if __name__ == "__main__":
    import uvicorn

    uvicorn.run(app, host="0.0.0.0", port=int(os.environ.get("PORT", "${ctx.port}")))
`;
}
