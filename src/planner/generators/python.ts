/**
 * Plain Python generator (standard-library HTTP server)
 */

import { GeneratorContext, lit, oneLine } from './types';

export function generatePython(ctx: GeneratorContext): string {
    const table = ctx.routes
        .map(r => `    (${lit(r.method)}, ${lit(r.path)}): ${lit(r.handler)},`)
        .join('\n');

    return `# ${oneLine(ctx.name)}: ${oneLine(ctx.goal)}
import json
import os
from http.server import BaseHTTPRequestHandler, HTTPServer

ROUTES = {
${table}
}


class Handler(BaseHTTPRequestHandler):
    def _dispatch(self, method):
        if (method, self.path) not in ROUTES:
            self.send_response(404)
            self.end_headers()
            return
        body = json.dumps({"status": "ok", "endpoint": self.path, "method": method}).encode()
        self.send_response(200)
        self.send_header("Content-Type", "application/json")
        self.end_headers()
        self.wfile.write(body)

    def do_GET(self):
        self._dispatch("GET")

    def do_POST(self):
        self._dispatch("POST")

    def do_PUT(self):
        self._dispatch("PUT")

    def do_DELETE(self):
        self._dispatch("DELETE")

    def do_PATCH(self):
        self._dispatch("PATCH")


if __name__ == "__main__":
    port = int(os.environ.get("PORT", "${ctx.port}"))
    print(${lit(ctx.name)} + " listening on " + str(port))
    HTTPServer(("0.0.0.0", port), Handler).serve_forever()
`;
}
