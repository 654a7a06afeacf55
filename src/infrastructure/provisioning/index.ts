export { ExternalServiceProvisioner } from './service-provisioner.js';
