import { createPackageLogger } from '@strata/utils';

export const logger = createPackageLogger('@strata/lab');
