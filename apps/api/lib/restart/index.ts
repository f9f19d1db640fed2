export { RestartCoordinator, type RestartCoordinatorConfig } from './coordinator'
