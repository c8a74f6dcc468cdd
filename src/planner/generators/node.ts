/**
 * Plain Node generator (http module)
 */

import { GeneratorContext, lit, oneLine } from './types';

export function generateNode(ctx: GeneratorContext): string {
    const table = ctx.routes
        .map(r => `    ${lit(`${r.method} ${r.path}`)}: ${lit(r.handler)},`)
        .join('\n');

    return `// ${oneLine(ctx.name)}: ${oneLine(ctx.goal)}
const http = require("http");

const routes = {
${table}
};

const server = http.createServer((req, res) => {
    const key = req.method + " " + req.url;
    if (!(key in routes)) {
        res.writeHead(404);
        res.end();
        return;
    }
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ status: "ok", endpoint: req.url, method: req.method }));
});

const port = Number(process.env.PORT || ${ctx.port});
server.listen(port, "0.0.0.0", () => {
    console.log(${lit(ctx.name)} + " listening on " + port);
});
`;
}
