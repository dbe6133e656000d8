import { FileMakerConfig, ShotGridConfig } from '../../src/config/config.manager'
import { ShotGridRecord } from '../../src/types/shotgrid.types'
import { SourceEntity } from '../../src/types/sync.types'

export const shotgridConfig: ShotGridConfig = {
  url: 'https://sg.test.local',
  scriptName: 'test-script',
  scriptKey: 'test-secret',
  timeoutMs: 5000,
}

export const filemakerConfig: FileMakerConfig = {
  baseUrl: 'https://fm.test.local',
  database: 'Editorial',
  layout: 'Plates',
  user: 'test-user',
  password: 'test-password',
  timeoutMs: 5000,
}

export const entity = (id: number, fields: SourceEntity['fields']): SourceEntity => ({
  id,
  type: 'Element',
  fields,
})

/** Element 10: a plate with a version and a shot link */
export const populatedRecord: ShotGridRecord = {
  id: 10,
  type: 'Element',
  attributes: {
    sg_slate: '12A-3',
    sg_camera_file_name: 'A001C003_230101_R1AB.mov',
    sg_source_in: '01:00:00:00',
    sg_source_out: '01:00:10:00',
    sg_turnover: null,
    sg_head_in: 993,
    sg_cut_in: 1001,
    sg_cut_out: 1240,
    sg_tail_out: 1248,
    sg_lut: '',
    description: 'Clean plate',
    'sg_latest_version.Version.code': 'PL_010_v003',
    'shot.Shot.code': 'SH010',
  },
  relationships: {
    sg_latest_version: { data: { id: 501, type: 'Version', name: 'PL_010' } },
    shot: { data: { id: 1204, type: 'Shot', name: 'SH010' } },
  },
}

/** Element 11: nothing mapped is filled in */
export const emptyRecord: ShotGridRecord = {
  id: 11,
  type: 'Element',
  attributes: {
    sg_slate: null,
    sg_camera_file_name: '',
    description: null,
  },
  relationships: {
    sg_latest_version: { data: null },
    shot: { data: null },
  },
}
