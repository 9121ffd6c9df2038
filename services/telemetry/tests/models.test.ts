import assert from 'node:assert/strict';
import { test } from 'node:test';
import { createTestService, fixedClock, seedTenant } from './testEnv';

const modelInput = {
  machineId: 'M1',
  clientId: 'C1',
  modelType: 'isolation_forest',
  accuracyScore: 0.93,
  hyperparameters: { nEstimators: 200, contamination: 0.02 }
};

test('registering an active model replaces the current one', async () => {
  const { service, recorder } = await createTestService({ now: fixedClock('2026-06-01T10:00:00.000Z') });
  await seedTenant(service, 'C1', ['M1']);

  const v1 = await service.models.register({ ...modelInput, modelVersion: '1.0.0' });
  assert.equal(v1.isActive, true);
  assert.equal(v1.deployedAt, '2026-06-01T10:00:00.000Z');

  const v2 = await service.models.register({ ...modelInput, modelVersion: '1.1.0' });
  const active = await service.models.getActive('M1', 'isolation_forest');
  assert.equal(active?.id, v2.id);
  assert.equal((await service.models.get(v1.id)).isActive, false);

  const activeModels = await service.models.list({ machineId: 'M1', modelType: 'isolation_forest', activeOnly: true });
  assert.deepEqual(
    activeModels.map((model) => model.modelVersion),
    ['1.1.0']
  );

  assert.deepEqual(
    recorder.ofType('telemetry.model.activated').map((event) => event.payload),
    [
      {
        modelId: v1.id,
        machineId: 'M1',
        clientId: 'C1',
        modelType: 'isolation_forest',
        modelVersion: '1.0.0',
        deployedAt: '2026-06-01T10:00:00.000Z'
      },
      {
        modelId: v2.id,
        machineId: 'M1',
        clientId: 'C1',
        modelType: 'isolation_forest',
        modelVersion: '1.1.0',
        deployedAt: '2026-06-01T10:00:00.000Z'
      }
    ]
  );

  await service.close();
});

test('activation swaps the active model and leaves other types alone', async () => {
  const { service } = await createTestService();
  await seedTenant(service, 'C1', ['M1', 'M2']);

  const forest = await service.models.register({ ...modelInput, modelVersion: '1.0.0' });
  const candidate = await service.models.register({ ...modelInput, modelVersion: '2.0.0', isActive: false });
  assert.equal(candidate.deployedAt, null);
  const autoencoder = await service.models.register({ ...modelInput, modelType: 'autoencoder', modelVersion: '0.3.0' });
  const otherMachine = await service.models.register({ ...modelInput, machineId: 'M2', modelVersion: '1.0.0' });

  const activated = await service.models.activate(candidate.id);
  assert.equal(activated.isActive, true);
  assert.ok(activated.deployedAt);

  assert.equal((await service.models.get(forest.id)).isActive, false);
  assert.equal((await service.models.getActive('M1', 'isolation_forest'))?.id, candidate.id);
  assert.equal((await service.models.getActive('M1', 'autoencoder'))?.id, autoencoder.id);
  assert.equal((await service.models.getActive('M2', 'isolation_forest'))?.id, otherMachine.id);

  const deactivated = await service.models.deactivate(candidate.id);
  assert.equal(deactivated.isActive, false);
  assert.equal(await service.models.getActive('M1', 'isolation_forest'), null);

  await service.close();
});

test('model input is validated against the tenant graph', async () => {
  const { service } = await createTestService();
  await seedTenant(service, 'C1', ['M1']);
  await seedTenant(service, 'C2', ['M2']);

  await assert.rejects(service.models.register({ ...modelInput, modelVersion: '1.0.0', f1Score: 1.2 }), {
    code: 'validation_failed'
  });
  await assert.rejects(service.models.register({ ...modelInput, machineId: 'M2', modelVersion: '1.0.0' }), {
    code: 'machine_client_mismatch'
  });
  await assert.rejects(service.models.activate(42), { name: 'NotFoundError' });
  await assert.rejects(service.models.deactivate(42), { name: 'NotFoundError' });

  await service.close();
});
