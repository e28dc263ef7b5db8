import { Device } from '../../src/devices';
import { DeviceError, InvalidRequestError, UnsupportedCapabilityError } from '../../src/errors';
import { SmartHomeFulfillment, SYNC_FAILURE_CODE } from '../../src/fulfillment';
import { makeOnOffDevice, silentLogger, TestSwitch } from '../support/fixtures';

const SYNC = { requestId: '02', inputs: [{ intent: 'action.devices.SYNC' }] };

function query(...ids: string[]) {
  return {
    requestId: '02',
    inputs: [{ intent: 'action.devices.QUERY', payload: { devices: ids.map((id) => ({ id })) } }],
  };
}

function execute(ids: string[], execution: unknown[]) {
  return {
    requestId: '02',
    inputs: [
      {
        intent: 'action.devices.EXECUTE',
        payload: { commands: [{ devices: ids.map((id) => ({ id })), execution }] },
      },
    ],
  };
}

const turnOn = { command: 'action.devices.commands.OnOff', params: { on: true } };

describe('SmartHomeFulfillment', () => {
  let fulfillment: SmartHomeFulfillment;
  let impl: TestSwitch;

  beforeEach(() => {
    fulfillment = new SmartHomeFulfillment({
      config: { agentUserId: '01' },
      logger: silentLogger,
    });
    impl = new TestSwitch('Test switch');
    fulfillment.addDevice(makeOnOffDevice('00', impl));
  });

  // -----------------------------------------------------------------------
  // SYNC
  // -----------------------------------------------------------------------

  describe('SYNC', () => {
    it('should describe every device', async () => {
      await expect(fulfillment.handleRequest(SYNC)).resolves.toEqual({
        requestId: '02',
        payload: {
          agentUserId: '01',
          devices: [
            {
              id: '00',
              type: 'action.devices.types.SWITCH',
              traits: ['action.devices.traits.OnOff'],
              name: { name: 'Test switch', defaultNames: ['TS-1 switch'], nicknames: ['hall light'] },
              willReportState: false,
              roomHint: 'Hallway',
              deviceInfo: { manufacturer: 'Test Works', model: 'TS-1', hwVersion: '1.0', swVersion: '2.3.1' },
              attributes: {},
            },
          ],
        },
      });
    });

    it('should fail the whole payload with a transient error on a driver fault', async () => {
      jest.spyOn(impl, 'getDeviceInfo').mockImplementation(() => {
        throw new Error('eeprom unreadable');
      });
      fulfillment.addDevice(makeOnOffDevice('03'));

      const response = await fulfillment.handleRequest(SYNC);
      expect(response.payload).toEqual({
        agentUserId: '01',
        devices: [],
        errorCode: SYNC_FAILURE_CODE,
        debugString: 'eeprom unreadable',
      });
    });

    it('should report a device error code on SYNC failure', async () => {
      jest.spyOn(impl, 'getDeviceName').mockImplementation(() => {
        throw new DeviceError('deviceNotReady');
      });

      const response = await fulfillment.handleRequest(SYNC);
      expect(response.payload).toEqual({
        agentUserId: '01',
        devices: [],
        errorCode: 'deviceNotReady',
        debugString: 'deviceNotReady',
      });
    });

    it('should return an empty device list with no devices', async () => {
      fulfillment.removeDevice('00');
      const response = await fulfillment.handleRequest(SYNC);
      expect(response.payload).toEqual({ agentUserId: '01', devices: [] });
    });
  });

  // -----------------------------------------------------------------------
  // QUERY
  // -----------------------------------------------------------------------

  describe('QUERY', () => {
    it('should report the current state', async () => {
      await expect(fulfillment.handleRequest(query('00'))).resolves.toEqual({
        requestId: '02',
        payload: { devices: { '00': { status: 'SUCCESS', online: true, on: false } } },
      });
    });

    it('should report an offline device', async () => {
      impl.online = false;
      const response = await fulfillment.handleRequest(query('00'));
      expect(response.payload).toEqual({ devices: { '00': { status: 'OFFLINE', online: false, on: true } } });
    });

    it('should report a failing getter as an error', async () => {
      impl.failQuery = true;
      const response = await fulfillment.handleRequest(query('00'));
      expect(response.payload).toEqual({
        devices: { '00': { status: 'ERROR', online: true, on: false, errorCode: 'bus timeout' } },
      });
    });

    it('should skip unknown ids and compute repeated ids once', async () => {
      const response = await fulfillment.handleRequest(query('00', 'missing', '00'));
      expect(response.payload).toEqual({ devices: { '00': { status: 'SUCCESS', online: true, on: false } } });
      expect(impl.calls).toEqual(['isOn']);
    });

    it('should answer identically when nothing changed', async () => {
      const first = await fulfillment.handleRequest(query('00'));
      const second = await fulfillment.handleRequest(query('00'));
      expect(second).toEqual(first);
    });
  });

  // -----------------------------------------------------------------------
  // EXECUTE
  // -----------------------------------------------------------------------

  describe('EXECUTE', () => {
    it('should run the command and report success', async () => {
      await expect(fulfillment.handleRequest(execute(['00'], [turnOn]))).resolves.toEqual({
        requestId: '02',
        payload: { commands: [{ ids: ['00'], status: 'SUCCESS', states: {} }] },
      });
      expect(impl.on).toBe(true);
    });

    it('should make the change visible to a following QUERY', async () => {
      await fulfillment.handleRequest(execute(['00'], [turnOn]));
      const response = await fulfillment.handleRequest(query('00'));
      expect(response.payload).toEqual({ devices: { '00': { status: 'SUCCESS', online: true, on: true } } });
    });

    it('should produce one result per device and command in request order', async () => {
      const other = new TestSwitch();
      fulfillment.addDevice(makeOnOffDevice('03', other));
      const turnOff = { command: 'action.devices.commands.OnOff', params: { on: false } };

      const response = await fulfillment.handleRequest(execute(['03', 'missing', '00'], [turnOn, turnOff]));
      expect(response.payload).toEqual({
        commands: [
          { ids: ['03'], status: 'SUCCESS', states: {} },
          { ids: ['03'], status: 'SUCCESS', states: {} },
          { ids: ['00'], status: 'SUCCESS', states: {} },
          { ids: ['00'], status: 'SUCCESS', states: {} },
        ],
      });
      expect(other.calls).toEqual(['setOn:true', 'setOn:false']);
    });

    it('should answer two command groups for two devices with one single-id result each', async () => {
      const other = new TestSwitch();
      fulfillment.addDevice(makeOnOffDevice('03', other));
      const dim = { command: 'action.devices.commands.OnOff', params: { on: false } };

      const response = await fulfillment.handleRequest({
        requestId: '02',
        inputs: [
          {
            intent: 'action.devices.EXECUTE',
            payload: {
              commands: [
                { devices: [{ id: '00' }], execution: [turnOn] },
                { devices: [{ id: '03' }], execution: [dim] },
              ],
            },
          },
        ],
      });

      expect(response.payload).toEqual({
        commands: [
          { ids: ['00'], status: 'SUCCESS', states: {} },
          { ids: ['03'], status: 'SUCCESS', states: {} },
        ],
      });
      expect(impl.on).toBe(true);
      expect(other.calls).toEqual(['setOn:false']);
    });

    it('should keep running later devices after one device fails', async () => {
      jest.spyOn(impl, 'setOn').mockImplementation(() => {
        throw new Error('relay stuck');
      });
      const other = new TestSwitch();
      fulfillment.addDevice(makeOnOffDevice('03', other));

      const response = await fulfillment.handleRequest(execute(['00', '03'], [turnOn]));
      expect(response.payload).toEqual({
        commands: [
          { ids: ['00'], status: 'OFFLINE', debugString: 'relay stuck' },
          { ids: ['03'], status: 'SUCCESS', states: {} },
        ],
      });
      expect(other.on).toBe(true);
    });

    it('should report a device error as ERROR with its code', async () => {
      const lock = new TestSwitch();
      lock.lockError = 'alreadyLocked';
      fulfillment.addDevice(new Device(lock, 'LOCK', 'lock-1').register('LockUnlock'));

      const response = await fulfillment.handleRequest(
        execute(['lock-1'], [{ command: 'action.devices.commands.LockUnlock', params: { lock: true } }]),
      );
      expect(response.payload).toEqual({
        commands: [{ ids: ['lock-1'], status: 'ERROR', errorCode: 'alreadyLocked' }],
      });
    });

    it('should report a driver fault as OFFLINE with a debug string', async () => {
      jest.spyOn(impl, 'setOn').mockImplementation(() => {
        throw new Error('relay stuck');
      });
      const response = await fulfillment.handleRequest(execute(['00'], [turnOn]));
      expect(response.payload).toEqual({
        commands: [{ ids: ['00'], status: 'OFFLINE', debugString: 'relay stuck' }],
      });
    });

    it('should reject a command for a trait the device never registered', async () => {
      const request = execute(['00'], [
        { command: 'action.devices.commands.BrightnessAbsolute', params: { brightness: 40 } },
      ]);
      await expect(fulfillment.handleRequest(request)).rejects.toThrow(UnsupportedCapabilityError);
    });

    it('should keep serving requests after a rejected one', async () => {
      const bad = execute(['00'], [{ command: 'action.devices.commands.Dock' }]);
      await expect(fulfillment.handleRequest(bad)).rejects.toThrow(UnsupportedCapabilityError);
      const response = await fulfillment.handleRequest(query('00'));
      expect(response.payload).toEqual({ devices: { '00': { status: 'SUCCESS', online: true, on: false } } });
    });
  });

  // -----------------------------------------------------------------------
  // DISCONNECT and envelope
  // -----------------------------------------------------------------------

  describe('DISCONNECT', () => {
    it('should notify every device and return an empty payload', async () => {
      const response = await fulfillment.handleRequest({
        requestId: '02',
        inputs: [{ intent: 'action.devices.DISCONNECT' }],
      });
      expect(response).toEqual({ requestId: '02', payload: {} });
      expect(impl.disconnected).toBe(true);
    });

    it('should carry on when a device fails to disconnect', async () => {
      jest.spyOn(impl, 'disconnect').mockImplementation(() => {
        throw new Error('socket closed');
      });
      const other = new TestSwitch();
      fulfillment.addDevice(makeOnOffDevice('03', other));

      const response = await fulfillment.handleRequest({
        requestId: '02',
        inputs: [{ intent: 'action.devices.DISCONNECT' }],
      });
      expect(response.payload).toEqual({});
      expect(other.disconnected).toBe(true);
    });
  });

  describe('request handling', () => {
    it('should only handle the first input', async () => {
      const response = await fulfillment.handleRequest({
        requestId: '02',
        inputs: [{ intent: 'action.devices.DISCONNECT' }, { intent: 'action.devices.SYNC' }],
      });
      expect(response.payload).toEqual({});
    });

    it('should reject a malformed body', async () => {
      await expect(fulfillment.handleRequest({ requestId: '02', inputs: [] })).rejects.toThrow(
        InvalidRequestError,
      );
    });

    it('should process concurrent requests in arrival order', async () => {
      const results = await Promise.all([
        fulfillment.handleRequest(execute(['00'], [turnOn])),
        fulfillment.handleRequest(query('00')),
      ]);
      expect(results[1].payload).toEqual({ devices: { '00': { status: 'SUCCESS', online: true, on: true } } });
    });
  });
});
