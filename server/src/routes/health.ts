/**
 * Health Check Routes
 *
 * Unauthenticated endpoints for:
 * - Basic health check
 * - Version info
 * - Which integrations are configured (no secrets exposed)
 */

import { Router } from 'express';
import { AppConfig } from '../config';

export interface HealthRouterDeps {
  config: AppConfig;
  version: string;
  // Pending local reminder notifications
  queuedReminders: () => number;
  connectedClients: () => number;
}

export function createHealthRouter({ config, version, queuedReminders, connectedClients }: HealthRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/v1/health
   */
  router.get('/', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      voiceClients: connectedClients(),
      queuedReminders: queuedReminders(),
    });
  });

  /**
   * GET /api/v1/health/version
   */
  router.get('/version', (req, res) => {
    res.json({
      version,
      nodeVersion: process.version,
      environment: config.env,
      uptime: process.uptime(),
    });
  });

  /**
   * GET /api/v1/health/config
   */
  router.get('/config', (req, res) => {
    res.json({
      weather: {
        url: new URL(config.weather.baseUrl).origin,
        defaultCity: config.weather.defaultCity,
      },
      search: {
        mode: config.search.mode,
      },
      email: {
        configured: Boolean(config.email.user && config.email.password),
        host: config.email.host,
      },
      calendar: {
        calendarId: config.calendar.calendarId,
        timeZone: config.calendar.timeZone,
      },
      apps: {
        customTable: Boolean(config.apps.configPath),
      },
    });
  });

  return router;
}
