import logger from '../config/logger';
import { Provider } from '../domain/provider';
import type { ProviderRepository } from '../repositories/types';
import type { ProviderCreateInput } from '../types/subscription';

/**
 * Providers are matched by name, case-insensitively; registering a name that
 * already exists returns the stored provider unchanged.
 */
export class RegisterProviderUseCase {
  constructor(private readonly providerRepository: ProviderRepository) {}

  async execute(input: ProviderCreateInput): Promise<Provider> {
    const name = input.name.trim();

    const existing = await this.providerRepository.findByName(name);
    if (existing) {
      logger.debug('Provider already registered', { providerId: existing.id, name });
      return existing;
    }

    const provider = Provider.create(name, input.category.trim(), input.website);
    await this.providerRepository.save(provider);

    logger.info('Provider registered', { providerId: provider.id, name, category: provider.category });
    return provider;
  }
}
