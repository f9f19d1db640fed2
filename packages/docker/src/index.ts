export {
  DockerInspector,
  fromDockerode,
  type DockerClient,
  type DockerContainerSummary,
  type DockerInspectorConfig,
} from './docker-inspector'
export { describeDockerTarget, parseDockerHost } from './docker-host'
