export { ParallelCoordinator } from './coordinator';
export type {
    TaskSpec,
    TaskOutcome,
    TaskHandle,
    TaskRunner,
    CoordinatorConfig,
} from './coordinator';
