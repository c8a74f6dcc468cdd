/**
 * Express service generator
 */

import { GeneratorContext, lit, oneLine } from './types';

export function generateExpress(ctx: GeneratorContext): string {
    const routes = ctx.routes.map(r => `// ${r.handler}
app.${r.method.toLowerCase()}(${lit(r.path)}, (req, res) => {
    res.json({ status: "ok", endpoint: ${lit(r.path)}, method: ${lit(r.method)} });
});
`);

    return `// ${oneLine(ctx.name)}: ${oneLine(ctx.goal)}
const express = require("express");

const app = express();
app.use(express.json());

${routes.join('\n')}${routes.length > 0 ? '\n' : ''}const port = Number(process.env.PORT || ${ctx.port});
app.listen(port, "0.0.0.0", () => {
    console.log(${lit(ctx.name)} + " listening on " + port);
});
`;
}
