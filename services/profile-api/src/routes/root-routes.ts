import { Router } from 'express';

export interface RootResponse {
  message: string;
  endpoints: Record<string, string>;
}

export const ROOT_RESPONSE: Readonly<RootResponse> = Object.freeze({
  message: 'Welcome to the Profile API',
  endpoints: Object.freeze({
    '/me': 'GET - Returns profile information with a cat fact',
    '/health': 'GET - Health check endpoint'
  })
});

const router = Router();

/**
 * @route   GET /
 * @desc    Lists the available endpoints
 * @access  Public
 */
router.get('/', (_req, res) => {
  res.status(200).json(ROOT_RESPONSE);
});

export default router;
