import { Context, Effect, Layer } from 'effect'

import type { Logger } from '~/logger'

import { type CertificateAuthorityClient, createCertificateLifecycleManager } from './certificate-lifecycle'
import { loadOperatorConfig, type OperatorConfig, SBI_PORT, SBI_PORT_NAME } from './config'
import { createConfigReconciler } from './config-reconciler'
import { type ContainerStore, createFilesystemContainerStore } from './container-store'
import { createFileDeferredEventQueue, type DeferredEventQueue } from './deferred-queue'
import { createEventRouter, createReconciliationDispatcher, type DispatchReport } from './dispatcher'
import { toError } from './errors'
import type { OperatorEvent } from './events'
import {
  createCertificateRequestOutbox,
  createRelationSnapshotReader,
  createStatusFileReporter,
  type StatusReporter,
} from './host-state'
import { createIdentityStore } from './identity-store'
import { createKubernetesLeaseApi, ensureSingleActiveInstance } from './leadership'
import { createPebbleClient } from './pebble-client'
import { createPodAddressResolver } from './pod-address'
import {
  type ContainerConnection,
  createPreconditionGate,
  type NrfRegistrationClient,
  type PodAddressResolver,
  type RelationDirectory,
} from './precondition-gate'
import { createKubernetesServiceApi, publishServicePorts } from './service-ports'
import { createServiceSupervisor, type ProcessSupervisor } from './service-supervisor'
import { createFileTemplateRenderer, type TemplateRenderer } from './template'
import { defaultTlsPrimitives, type TlsPrimitives } from './tls'

export type OperatorSetup = {
  containerName: string
  serviceName: string
  logger: Logger
  store: ContainerStore
  container: ContainerConnection
  supervisor: ProcessSupervisor
  relations: RelationDirectory
  nrf: NrfRegistrationClient
  podAddress: PodAddressResolver
  certificateAuthority: CertificateAuthorityClient
  renderer: TemplateRenderer
  tls: TlsPrimitives
  status: StatusReporter
  deferredQueue: DeferredEventQueue
}

export const createOperator = (setup: OperatorSetup) => {
  const { logger } = setup
  const identityStore = createIdentityStore({ store: setup.store, logger: logger.child({ component: 'identity-store' }) })
  const dispatcher = createReconciliationDispatcher({
    gate: createPreconditionGate({
      container: setup.container,
      relations: setup.relations,
      nrf: setup.nrf,
      store: setup.store,
      podAddress: setup.podAddress,
    }),
    configReconciler: createConfigReconciler({
      store: setup.store,
      renderer: setup.renderer,
      logger: logger.child({ component: 'config' }),
    }),
    serviceSupervisor: createServiceSupervisor({
      supervisor: setup.supervisor,
      containerName: setup.containerName,
      serviceName: setup.serviceName,
      logger: logger.child({ component: 'service' }),
    }),
    identityStore,
    status: setup.status,
    logger,
  })
  const certificates = createCertificateLifecycleManager({
    identityStore,
    tls: setup.tls,
    certificateAuthority: setup.certificateAuthority,
    canConnect: () => setup.container.canConnect(),
    reconcile: () => dispatcher.configure(),
    logger: logger.child({ component: 'certificates' }),
  })
  const router = createEventRouter({
    dispatcher,
    certificates,
    deferredQueue: setup.deferredQueue,
    logger,
  })
  return { identityStore, dispatcher, certificates, router }
}

/** Builds every collaborator from configuration and runs the startup checks. */
export const setupFromEnvironment = async (
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env,
  config: OperatorConfig = loadOperatorConfig(env),
): Promise<OperatorSetup> => {
  if (config.leaderElection.enabled) {
    await ensureSingleActiveInstance({
      api: createKubernetesLeaseApi(),
      config: config.leaderElection,
      namespace: config.namespace,
      identity: config.identity,
      statefulSetName: config.appName,
      logger,
    })
  }
  if (config.servicePatchEnabled) {
    await publishServicePorts({
      api: createKubernetesServiceApi(),
      serviceName: config.appName,
      namespace: config.namespace,
      ports: [{ name: SBI_PORT_NAME, port: SBI_PORT, protocol: 'TCP' }],
      logger,
    })
  }
  const pebble = createPebbleClient({
    socketPath: config.pebbleSocketPath,
    logger: logger.child({ component: 'pebble' }),
  })
  const snapshot = createRelationSnapshotReader(config.stateDir)
  return {
    containerName: config.containerName,
    serviceName: config.serviceName,
    logger,
    store: createFilesystemContainerStore(config.workloadRoot),
    container: pebble,
    supervisor: pebble,
    relations: snapshot.relations,
    nrf: snapshot.nrf,
    podAddress: createPodAddressResolver({ env }),
    certificateAuthority: createCertificateRequestOutbox({ stateDir: config.stateDir, logger }).client,
    renderer: createFileTemplateRenderer(config.templateDir),
    tls: defaultTlsPrimitives,
    status: createStatusFileReporter({ stateDir: config.stateDir, logger }),
    deferredQueue: createFileDeferredEventQueue({ stateDir: config.stateDir, logger }),
  }
}

export type AusfOperatorService = {
  dispatch: (event: OperatorEvent) => Effect.Effect<DispatchReport, Error>
}

export class AusfOperator extends Context.Tag('AusfOperator')<AusfOperator, AusfOperatorService>() {}

export const makeAusfOperatorLayer = (setup: () => Promise<OperatorSetup>) =>
  Layer.effect(
    AusfOperator,
    Effect.gen(function* () {
      const resolved = yield* Effect.tryPromise({ try: setup, catch: toError })
      const operator = createOperator(resolved)
      return {
        dispatch: (event: OperatorEvent) =>
          Effect.tryPromise({
            try: () => operator.router.dispatch(event),
            catch: toError,
          }),
      } satisfies AusfOperatorService
    }),
  )

export const makeAusfOperatorLive = (logger: Logger) => makeAusfOperatorLayer(() => setupFromEnvironment(logger))

export const dispatchEffect = (event: OperatorEvent) => Effect.flatMap(AusfOperator, (service) => service.dispatch(event))
