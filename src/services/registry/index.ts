export { ActionGroupRegistry, RegistrySnapshot } from './ActionGroupRegistry';
export { validateReceiver, receiverKey, MAX_SHORT_NAME_LENGTH } from './receivers';
export * from './types';
