export const SMARTCTL_SCAN = JSON.stringify({
  devices: [
    { name: '/dev/sda', info_name: '/dev/sda [SAT]', type: 'sat', protocol: 'ATA' },
    { name: '/dev/nvme0', info_name: '/dev/nvme0', type: 'nvme', protocol: 'NVMe' },
  ],
});

export const SMARTCTL_SDA = JSON.stringify({
  smartctl: { exit_status: 0 },
  model_name: 'TEST-SSD 480G ',
  serial_number: 'SN-0001',
  firmware_version: 'FW1',
  smart_status: { passed: true },
  temperature: { current: 31 },
  power_on_time: { hours: 1200 },
  ata_smart_attributes: {
    table: [
      { id: 5, name: 'Reallocated_Sector_Ct', value: 100, raw: { value: 3, string: '3' } },
      { id: 9, name: 'Power_On_Hours', value: 99, raw: { value: 1200, string: '1200' } },
    ],
  },
});

export const SMARTCTL_NVME0 = JSON.stringify({
  model_name: 'TEST-NVME 1T',
  serial_number: 'SN-0002',
  firmware_version: 'FW2',
  smart_status: { passed: false },
  nvme_smart_health_information_log: {
    critical_warning: 0,
    percentage_used: 7,
    media_errors: 0,
    temperature_sensors: [35, 40],
  },
});

export function storcliShowAll(vdState: string, pdState = 'Onln', extraVirtualDrives: unknown[] = []): string {
  return JSON.stringify({
    Controllers: [
      {
        'Command Status': { Controller: 0, Status: 'Success', Description: 'None' },
        'Response Data': {
          Basics: {
            Controller: 0,
            Model: 'PERC H730P Mini',
            'Serial Number': 'CTRL-0001',
            'Current Controller Date/Time': '03/15/2024, 10:20:00',
            'Current System Date/time': '03/15/2024, 10:22:05',
          },
          Version: { 'Firmware Version': '25.5.9.0001', 'Bios Version': '6.33.01.0_4.19.08.00_0x06120304', 'Driver Name': 'megaraid_sas' },
          Status: {
            'Controller Status': 'Optimal',
            'Memory Correctable Errors': 0,
            'Memory Uncorrectable Errors': 0,
            'BBU Status': 0,
          },
          HwCfg: {
            'Backend Port Count': 8,
            'On Board Memory Size': '2048MB',
            'Current Size of FW Cache (MB)': 1548,
            'ROC temperature(Degree Celsius)': 52,
          },
          'Scheduled Tasks': { 'Patrol Read Reoccurrence': '168 hrs' },
          'Drive Groups': 1,
          'Virtual Drives': 1 + extraVirtualDrives.length,
          'Physical Drives': 2,
          'VD LIST': [{ 'DG/VD': '0/0', TYPE: 'RAID1', State: vdState, Access: 'RW', Name: 'os' }, ...extraVirtualDrives],
          'PD LIST': [
            { 'EID:Slt': '32:0', DID: 0, State: pdState, DG: 0, Intf: 'SATA', Med: 'SSD', Model: 'TEST-SSD 480G' },
            { 'EID:Slt': '32:1', DID: 1, State: 'Onln', DG: 0, Intf: 'SATA', Med: 'SSD', Model: 'TEST-SSD 480G' },
          ],
          Cachevault_Info: [{ Model: 'CVPM02', State: 'Optimal', Temp: '28C' }],
        },
      },
    ],
  });
}

export const STORCLI_HBA = JSON.stringify({
  Controllers: [
    {
      'Command Status': { Controller: 0, Status: 'Success', Description: 'None' },
      'Response Data': {
        Basics: { Controller: 0, Model: 'HBA330 Mini', 'Serial Number': 'HBA-0001' },
        Version: { 'Firmware Version': '16.17.01.00', 'Driver Name': 'mpt3sas' },
        Status: { 'Controller Status': 'OK' },
        HwCfg: { 'Backend Port Count': 8, 'ROC temperature(Degree Celcius)': 47 },
        'Physical Device Information': {
          'Drive /c0/s2': [{ 'EID:Slt': ' :2', DID: 2, State: 'JBOD', DG: '-', Intf: 'SAS', Med: 'HDD', Model: 'TEST-HDD 4T' }],
          'Drive /c0/s2 - Detailed Information': {
            'Drive /c0/s2 State': {
              'Media Error Count': 4,
              'Other Error Count': 1,
              'Predictive Failure Count': 0,
              'Drive Temperature': ' 36C (96.80 F)',
              'S.M.A.R.T alert flagged by drive': 'No',
            },
          },
        },
      },
    },
  ],
});

export const MEGACLI_LD_PD_INFO = [
  'Adapter #0',
  '',
  'Number of Virtual Disks: 1',
  'Virtual Drive: 0 (Target Id: 0)',
  'Name                :data',
  'RAID Level          : Primary-1, Secondary-3, RAID Level Qualifier-0',
  'Size                : 3.637 TB',
  'State               : Degraded',
  'Number Of Drives per span:2',
  'Span: 0 - Number of PDs: 2',
  '',
  'PD: 0 Information',
  'Enclosure Device ID: 32',
  'Slot Number: 0',
  'Device Id: 8',
  'Media Error Count: 0',
  'Other Error Count: 2',
  'Predictive Failure Count: 0',
  'Firmware state: Online, Spun Up',
  'Drive Temperature :31C (87.80 F)',
  'Drive has flagged a S.M.A.R.T alert : No',
  '',
  'PD: 1 Information',
  'Enclosure Device ID: 32',
  'Slot Number: 1',
  'Device Id: 9',
  'Media Error Count: 12',
  'Other Error Count: 0',
  'Predictive Failure Count: 1',
  'Firmware state: Rebuild',
  'Drive Temperature :N/A',
  'Drive has flagged a S.M.A.R.T alert : Yes',
  '',
  'Exit Code: 0x00',
].join('\n');

export const IPMITOOL_SEL = [
  '   1 | 01/02/2024 | 03:04:05 | Power Supply #0x51 | Failure detected | Asserted',
  '   2 | 01/02/2024 | 03:10:00 | Power Supply #0x51 | Failure detected | Deasserted',
  '   a | 02/01/2024 | 00:00:00 | Memory #0x02 | Correctable ECC | Asserted',
  'garbage line',
  '   c | 13/45/2024 | 00:00:00 | Fan #0x30 | Lower Critical | Asserted',
  '',
].join('\n');
