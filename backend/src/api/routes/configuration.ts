import { Router } from 'express';
import { SetConfigurationRequestSchema } from '@docshelf/shared/schemas/configuration.zod';
import { getConfigurationResolver } from '../../services/configuration/ConfigurationResolver';
import { asyncHandler } from '../middleware/errorHandler';

const router = Router();

router.get(
  '/',
  asyncHandler(async (req, res) => {
    const settings = await getConfigurationResolver().list();
    res.json({ settings });
  })
);

router.get(
  '/:key',
  asyncHandler(async (req, res) => {
    const setting = await getConfigurationResolver().resolve(req.params.key);
    res.json(setting);
  })
);

router.put(
  '/:key',
  asyncHandler(async (req, res) => {
    const { value } = SetConfigurationRequestSchema.parse(req.body);
    const resolver = getConfigurationResolver();

    await resolver.set(req.params.key, value);

    res.json(await resolver.resolve(req.params.key));
  })
);

export default router;
