/**
 * Unit tests for edge onboarding
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { AttachmentCoordinator } from '../../src/attachment/attachment-coordinator';
import {
  DeviceNotFoundError,
  OnboardingTimeoutError,
  TemplateNotFoundError,
} from '../../src/errors';
import type { EdgeSpec } from '../../src/inventory/types';
import type { DeviceRecord } from '../../src/manager/types';
import { DeviceOnboarder } from '../../src/onboarding/device-onboarder';
import { edgeVariables } from '../../src/onboarding/edge-onboarder';
import { ReadinessPoller } from '../../src/polling/readiness-poller';
import { FakeClock } from '../helpers/fake-clock';
import { FakeManagerClient } from '../helpers/fake-manager-client';
import { createTestLogger } from '../helpers/test-logger';

function edge(serial: string, overrides: Partial<EdgeSpec> = {}): EdgeSpec {
  return {
    kind: 'edge',
    serial,
    systemIp: '10.255.0.1',
    siteId: 100,
    values: {},
    ...overrides,
  };
}

describe('DeviceOnboarder - edges (Unit)', () => {
  let client: FakeManagerClient;
  let clock: FakeClock;
  let observed: string[];
  let onboarder: DeviceOnboarder;

  beforeEach(() => {
    client = new FakeManagerClient();
    client.templates = [{ id: 'tmpl-1', name: 'branch-template' }];
    client.configGroups = [{ id: 'cg-1', name: 'branch-group' }];
    clock = new FakeClock();
    observed = [];
    const logger = createTestLogger('DeviceOnboarder');

    onboarder = new DeviceOnboarder(client, {
      poller: new ReadinessPoller({ clock, logger }),
      attachments: new AttachmentCoordinator(client, { clock, logger }),
      logger,
      certificateTimeout: 30000,
      pollInterval: 10000,
      observer: { deviceOnboarded: (_kind, id) => observed.push(id) },
    });
  });

  it('should skip an edge whose certificate is already installed', async () => {
    client.devices.vedges = [{ id: 'edge-1', serialNumber: 'SN-0001', certificateStatus: 'Installed' }];

    const ids = await onboarder.onboardEdges([
      edge('SN-0001', { attachment: { type: 'template', name: 'branch-template' } }),
    ]);

    expect(ids).toEqual(['edge-1']);
    expect(clock.sleeps).toEqual([]);
    expect(client.listDevices).toHaveBeenCalledTimes(1);
    expect(client.listTemplates).not.toHaveBeenCalled();
    expect(client.submitTemplateAttach).not.toHaveBeenCalled();
    expect(client.listConfigGroups).not.toHaveBeenCalled();
  });

  it('should wait for the certificate and then attach the template', async () => {
    const device: DeviceRecord = { id: 'edge-1', serialNumber: 'SN-0001', hostName: 'branch-1' };
    client.devices.vedges = [device];
    let listings = 0;
    client.listDevices.mockImplementation(async () => {
      listings++;
      // installed by the third listing: lookup, first check, second check
      if (listings === 3) {
        device.certificateStatus = 'Installed';
      }
      return [{ ...device }];
    });

    const ids = await onboarder.onboardEdges([
      edge('SN-0001', {
        attachment: { type: 'template', name: 'branch-template' },
        values: { hostname: 'edge1' },
      }),
    ]);

    expect(ids).toEqual(['edge-1']);
    expect(clock.sleeps).toEqual([10000]);
    expect(client.submitTemplateAttach).toHaveBeenCalledTimes(1);
    const [payload] = client.submitTemplateAttach.mock.calls[0];
    expect(payload.deviceTemplateList[0].device[0]).toEqual({
      'csv-status': 'complete',
      'csv-deviceId': 'edge-1',
      'csv-deviceIP': '10.255.0.1',
      'csv-host-name': 'branch-1',
      '//system/host-name': 'branch-1',
      '//system/system-ip': '10.255.0.1',
      '//system/site-id': '100',
      'csv-templateId': 'tmpl-1',
      hostname: 'edge1',
    });
    expect(observed).toEqual(['edge-1']);
  });

  it('should attach a configuration group with the merged variables', async () => {
    client.devices.vedges = [{ id: 'edge-2', serialNumber: 'SN-0002', certificateStatus: 'Installed' }];

    await onboarder.onboardEdges(
      [edge('SN-0002', { attachment: { type: 'config-group', name: 'branch-group' }, values: { hostname: 'edge2' } })],
      false
    );

    expect(client.associateDevice).toHaveBeenCalledWith('cg-1', 'edge-2');
    expect(client.pushVariables).toHaveBeenCalledWith('cg-1', 'edge-2', [
      { name: 'system_ip', value: '10.255.0.1' },
      { name: 'site_id', value: 100 },
      { name: 'hostname', value: 'edge2' },
    ]);
    expect(client.submitTemplateAttach).not.toHaveBeenCalled();
  });

  it('should leave an edge without attachment unconfigured', async () => {
    client.devices.vedges = [{ id: 'edge-1', serialNumber: 'SN-0001', certificateStatus: 'Installed' }];

    const ids = await onboarder.onboardEdges([edge('SN-0001')], false);

    expect(ids).toEqual(['edge-1']);
    expect(client.listTemplates).not.toHaveBeenCalled();
    expect(client.listConfigGroups).not.toHaveBeenCalled();
  });

  it('should find an edge by its remote id', async () => {
    client.devices.vedges = [{ id: 'edge-1', serialNumber: 'SN-0001', certificateStatus: 'Installed' }];

    await expect(onboarder.onboardEdges([edge('edge-1')])).resolves.toEqual(['edge-1']);
  });

  it('should abort the batch at the first edge missing from inventory', async () => {
    client.devices.vedges = [
      { id: 'edge-1', serialNumber: 'SN-0001', certificateStatus: 'Installed' },
      { id: 'edge-3', serialNumber: 'SN-0003', certificateStatus: 'Installed' },
    ];

    const error = await onboarder.onboardEdges([edge('SN-0001'), edge('SN-MISSING'), edge('SN-0003')])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeviceNotFoundError);
    if (!(error instanceof DeviceNotFoundError)) return;
    expect(error.device).toBe('SN-MISSING');
    expect(error.message).toBe(
      'Edge device with serial SN-MISSING not found in manager inventory. ' +
      'Ensure the device has discovered the validator and appears in device inventory.'
    );
    expect(observed).toEqual(['edge-1']);
    // the third edge is never looked up
    expect(client.listDevices).toHaveBeenCalledTimes(2);
  });

  it('should time out waiting for a certificate with the serial in the message', async () => {
    client.devices.vedges = [{ id: 'edge-2', serialNumber: 'SN-0002' }];

    const error = await onboarder.onboardEdges([edge('SN-0002')]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OnboardingTimeoutError);
    expect(error).toHaveProperty(
      'message',
      'Failed to onboard edge SN-0002: Timeout waiting for certificate installation on edge-2: ' +
      '1 of 1 still pending after 40s'
    );
    expect(observed).toEqual([]);
  });

  it('should prefix attachment failures with the serial', async () => {
    client.devices.vedges = [{ id: 'edge-1', serialNumber: 'SN-0001', certificateStatus: 'Installed' }];

    const error = await onboarder.onboardEdges(
      [edge('SN-0001', { attachment: { type: 'template', name: 'missing-template' } })],
      false
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TemplateNotFoundError);
    expect(error).toHaveProperty(
      'message',
      "Failed to onboard edge SN-0001: Device template 'missing-template' not found in manager"
    );
  });
});

describe('edgeVariables', () => {
  it('should merge system_ip and site_id with the extra values', () => {
    expect(edgeVariables(edge('SN-0001', { values: { hostname: 'edge1' } }))).toEqual({
      system_ip: '10.255.0.1',
      site_id: 100,
      hostname: 'edge1',
    });
  });
});
