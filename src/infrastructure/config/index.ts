export { loadConnectorParameters, defaultParameterPath } from './parameter-file.js';
