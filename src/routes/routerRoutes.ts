import type { FastifyPluginAsync } from 'fastify';
import type { AppContext } from '../context.js';
import { buildTargetUrl } from '../proxy.js';

export function routerRoutes({ router }: AppContext): FastifyPluginAsync {
  return async (app) => {
    app.get('/routes', async () => {
      const routes = router.getActiveRoutes();
      return { routes, totalCount: routes.length };
    });

    app.get<{ Params: { id: string } }>('/test/:id', async (request) =>
      router.testEndpointConnectivity(request.params.id)
    );

    app.post('/refresh', async () => {
      router.refreshRoutes();
      const routes = router.getActiveRoutes();
      return { success: true, message: 'Route mappings refreshed', routesCount: routes.length };
    });

    app.get<{ Params: { '*': string } }>('/debug/*', async (request) => {
      const path = request.params['*'];
      const normalizedPath = path.startsWith('/') ? path : `/${path}`;
      const match = router.resolve(normalizedPath);
      if (!match) {
        return { inputPath: path, normalizedPath, matchedEndpoint: null, error: 'No matching endpoint found' };
      }

      const { endpoint, pattern, relativePath } = match;
      return {
        inputPath: path,
        normalizedPath,
        matchedPattern: pattern,
        matchedEndpoint: {
          endpointId: endpoint.id,
          name: endpoint.config.name ?? null,
          url: endpoint.config.url,
          methods: [...endpoint.config.methods],
          status: endpoint.status,
        },
        relativePath,
        wouldForwardTo: buildTargetUrl(endpoint.config.url, relativePath),
      };
    });
  };
}
