import { InitCatalog1710000000000 } from './1710000000000-InitCatalog';
import { AddProfiles1710000001000 } from './1710000001000-AddProfiles';
import { AddComments1710000002000 } from './1710000002000-AddComments';

export const MIGRATIONS = [
  InitCatalog1710000000000,
  AddProfiles1710000001000,
  AddComments1710000002000,
];
