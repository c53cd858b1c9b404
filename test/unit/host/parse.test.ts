import {
  parseRegistryValue,
  parseServiceState,
  parsePackageNames,
  parseFeatureEnabled,
  parseIpv4,
  parseIdList,
} from '../../../src/host/commands/parse.js';

describe('native output parsers', () => {
  it('reads a registry value line', () => {
    const out = '\r\nHKEY_LOCAL_MACHINE\\SOFTWARE\\Microsoft\\Windows NT\\CurrentVersion\r\n    CurrentBuild    REG_SZ    17763\r\n\r\n';
    expect(parseRegistryValue(out, 'CurrentBuild')).toBe('17763');
    expect(parseRegistryValue(out, 'EditionID')).toBeNull();
  });

  it('keeps spaces inside registry values', () => {
    const out = '    Path    REG_EXPAND_SZ    C:\\Program Files\\iotedge;C:\\Windows\r\n';
    expect(parseRegistryValue(out, 'Path')).toBe('C:\\Program Files\\iotedge;C:\\Windows');
  });

  it('maps sc.exe states', () => {
    expect(parseServiceState('        STATE              : 4  RUNNING\r\n')).toBe('running');
    expect(parseServiceState('        STATE              : 1  STOPPED\r\n')).toBe('stopped');
    expect(parseServiceState('        STATE              : 2  START_PENDING\r\n')).toBe('start_pending');
    expect(parseServiceState('garbage')).toBe('unknown');
  });

  it('filters package identities by prefix', () => {
    const table = [
      'Package Identity | State | Release Type | Install Time',
      'Microsoft-Azure-IoTEdge~31bf3856ad364e35~amd64~~1.0.0.0 | Installed | Update | 1/1/2024',
      'Package_for_KB123~31bf3856ad364e35~amd64~~1.0 | Installed | Security Update | 1/1/2024',
    ].join('\r\n');
    expect(parsePackageNames(table, 'Microsoft-Azure-IoTEdge')).toEqual(['Microsoft-Azure-IoTEdge~31bf3856ad364e35~amd64~~1.0.0.0']);
  });

  it('reads feature state', () => {
    expect(parseFeatureEnabled('Feature Name : Containers\r\nState : Enabled\r\n')).toBe(true);
    expect(parseFeatureEnabled('State : Disable Pending\r\n')).toBe(false);
  });

  it('finds the first IPv4 address and splits id lists', () => {
    expect(parseIpv4('\r\n10.0.75.1\r\n')).toBe('10.0.75.1');
    expect(parseIpv4('')).toBeNull();
    expect(parseIdList('abc\r\n\r\ndef\n')).toEqual(['abc', 'def']);
  });
});
