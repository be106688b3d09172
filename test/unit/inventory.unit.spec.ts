/**
 * Unit tests for inventory loading and serialization
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InventoryValidationError } from '../../src/errors';
import {
  dumpInventory,
  loadInventory,
  parseInventory,
  saveInventory,
  totalDevices,
} from '../../src/inventory/inventory';

const yamlInventory = `
manager:
  url: https://10.0.0.10
  username: admin
  password: test-secret
  port: 8443
controllers:
  - ip: 10.0.0.11
    password: test-secret
validators:
  - ip: 10.0.0.21
    site_id: 1
    system_ip: 1.1.1.21
edges:
  - serial: SN-0001
    system_ip: 10.255.0.1
    site_id: 100
    template_name: branch-template
    values:
      hostname: edge1
  - serial: SN-0002
    system_ip: 10.255.0.2
    site_id: 200
    config_group: branch-group
`;

describe('Inventory', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'onboarder-inventory-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  describe('loadInventory', () => {
    it('should map the file into typed device specs', () => {
      const inventory = loadInventory(writeFile('devices.yaml', yamlInventory));

      expect(inventory.manager).toEqual({
        url: 'https://10.0.0.10',
        username: 'admin',
        password: 'test-secret',
        port: 8443,
        verify: false,
      });
      expect(inventory.controllers).toEqual([
        { kind: 'controller', ip: '10.0.0.11', password: 'test-secret' },
      ]);
      expect(inventory.validators).toEqual([
        { kind: 'validator', ip: '10.0.0.21', siteId: 1, systemIp: '1.1.1.21' },
      ]);
      expect(inventory.edges).toEqual([
        {
          kind: 'edge',
          serial: 'SN-0001',
          systemIp: '10.255.0.1',
          siteId: 100,
          attachment: { type: 'template', name: 'branch-template' },
          values: { hostname: 'edge1' },
        },
        {
          kind: 'edge',
          serial: 'SN-0002',
          systemIp: '10.255.0.2',
          siteId: 200,
          attachment: { type: 'config-group', name: 'branch-group' },
          values: {},
        },
      ]);
      expect(totalDevices(inventory)).toBe(4);
    });

    it('should reject a missing file', () => {
      const file = path.join(tmpDir, 'missing.yaml');

      expect(() => loadInventory(file)).toThrow(new InventoryValidationError(`File not found: ${file}`));
    });

    it('should reject malformed YAML', () => {
      const file = writeFile('broken.yaml', 'manager: [unclosed');

      expect(() => loadInventory(file)).toThrow(InventoryValidationError);
    });
  });

  describe('parseInventory', () => {
    const manager = { url: 'https://10.0.0.10', username: 'admin', password: 'test-secret' };

    it('should default the device lists to empty', () => {
      const inventory = parseInventory({ manager });

      expect(inventory.controllers).toEqual([]);
      expect(inventory.validators).toEqual([]);
      expect(inventory.edges).toEqual([]);
      expect(inventory.manager.port).toBe(443);
    });

    it('should reject an edge naming both a template and a config group', () => {
      const error = (() => {
        try {
          parseInventory({
            manager,
            edges: [{
              serial: 'SN-0001',
              system_ip: '10.255.0.1',
              site_id: 100,
              template_name: 'branch-template',
              config_group: 'branch-group',
            }],
          });
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(InventoryValidationError);
      if (!(error instanceof InventoryValidationError)) return;
      expect(error.issues).toEqual(['edges.0: template_name and config_group are mutually exclusive']);
    });

    it('should report the location of each invalid field', () => {
      const error = (() => {
        try {
          parseInventory({ manager: { ...manager, url: 'manager.test' }, controllers: [{}] });
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(InventoryValidationError);
      if (!(error instanceof InventoryValidationError)) return;
      expect(error.issues).toEqual([
        'manager.url: URL must start with http:// or https://',
        'controllers.0.ip: Required',
      ]);
    });
  });

  describe('saveInventory', () => {
    it('should write a file that loads back to the same inventory', () => {
      const original = loadInventory(writeFile('devices.yaml', yamlInventory));
      const file = path.join(tmpDir, 'saved.yaml');

      saveInventory(original, file);

      expect(loadInventory(file)).toEqual(original);
    });

    it('should omit unset optional fields', () => {
      const yaml = dumpInventory(parseInventory({
        manager: { url: 'https://10.0.0.10', username: 'admin', password: 'test-secret' },
        controllers: [{ ip: '10.0.0.11' }],
      }));

      expect(yaml).toBe([
        'manager:',
        '  url: https://10.0.0.10',
        '  username: admin',
        '  password: test-secret',
        '  port: 443',
        '  verify: false',
        'controllers:',
        '  - ip: 10.0.0.11',
        'validators: []',
        'edges: []',
        '',
      ].join('\n'));
    });
  });
});
