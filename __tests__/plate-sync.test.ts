/**
 * End-to-end tests of one sync request against in-process ShotGrid and
 * FileMaker stand-ins.
 *
 * Source: src/services/plateSync.service.ts
 */
import {
  SessionAcquisitionError,
  SubmissionError,
  UpstreamQueryError,
} from '../src/errors/sync.errors'
import { createSyncService as setup } from './helpers/fakeClients'
import { emptyRecord, populatedRecord } from './helpers/fixtures'

const PLATE_FIELDS = [
  'Plate Name',
  'Slate',
  'Source File Name',
  'Timecode In',
  'Timecode Out',
  'Head In',
  'Cut In',
  'Cut Out',
  'Tail Out',
  'Notes',
  'ForeignKey',
]

describe('PlateSyncService.synchronize()', () => {
  it('creates one record for a populated plate and skips an empty one', async () => {
    const { service, target } = setup([populatedRecord, emptyRecord])

    const result = await service.synchronize({
      entityType: 'Element',
      ids: [10, 11],
      diagnostic: false,
    })

    expect(result).toEqual({
      ok: true,
      message: 'Sent 1 records to FileMaker.',
      requested: 1,
      created: 1,
      skipped: 1,
      details: [
        { sourceId: 10, status: 'created', fields: PLATE_FIELDS },
        { sourceId: 11, status: 'skipped', reason: 'no mapped fields present' },
      ],
      targetResponse: 'hidden (debug off)',
    })

    expect(target.createSession).toHaveBeenCalledTimes(1)
    expect(target.createRecords).toHaveBeenCalledTimes(1)
    expect(target.createRecords.mock.calls[0][1]).toHaveLength(1)
    expect(target.createRecords.mock.calls[0][1][0]['Plate Name']).toBe('PL_010')
    expect(target.createRecords.mock.calls[0][1][0].ForeignKey).toBe(1204)
    expect(target.closeSession).toHaveBeenCalledTimes(1)
  })

  it('counts requested as records built, not entities fetched', async () => {
    const { service } = setup([emptyRecord, populatedRecord, emptyRecord])

    const result = await service.synchronize({
      entityType: 'Element',
      ids: [10, 11],
      diagnostic: false,
    })

    expect(result.requested).toBe(1)
    expect(result.skipped).toBe(2)
  })

  it('does not open a FileMaker session when nothing maps', async () => {
    const { service, target } = setup([emptyRecord])

    const result = await service.synchronize({ entityType: 'Element', ids: [11], diagnostic: false })

    expect(result.requested).toBe(0)
    expect(result.created).toBe(0)
    expect(target.createSession).not.toHaveBeenCalled()
    expect(target.createRecords).not.toHaveBeenCalled()
  })

  it('returns diagnostics and the raw FileMaker response in debug mode', async () => {
    const { service } = setup([populatedRecord])

    const result = await service.synchronize({ entityType: 'Element', ids: [10], diagnostic: true })

    expect(result.targetResponse).toEqual({
      response: { records: [{ recordId: '100', modId: '0' }] },
    })
    expect(result.diagnostics?.fields[0]).toBe('id')
    expect(result.diagnostics?.records).toHaveLength(1)
  })

  it('fails with SubmissionError on a batch timeout and still releases the session', async () => {
    const { service, target } = setup([populatedRecord], {
      submitError: new SubmissionError(
        'Failed to send to FileMaker: FileMaker request timed out after 30000ms',
        1,
      ),
    })

    await expect(
      service.synchronize({ entityType: 'Element', ids: [10], diagnostic: false }),
    ).rejects.toBeInstanceOf(SubmissionError)

    expect(target.closeSession).toHaveBeenCalledTimes(1)
    expect(target.closeSession).toHaveBeenCalledWith('fm-token')
  })

  it('submits nothing when the session cannot be opened', async () => {
    const { service, target } = setup([populatedRecord], {
      sessionError: new SessionAcquisitionError('FileMaker credentials are not configured'),
    })

    await expect(
      service.synchronize({ entityType: 'Element', ids: [10], diagnostic: false }),
    ).rejects.toBeInstanceOf(SessionAcquisitionError)

    expect(target.createRecords).not.toHaveBeenCalled()
    expect(target.closeSession).not.toHaveBeenCalled()
  })

  it('touches FileMaker not at all when ShotGrid fails', async () => {
    const { service, target } = setup(new UpstreamQueryError('ShotGrid responded 503'))

    await expect(
      service.synchronize({ entityType: 'Element', ids: [10], diagnostic: false }),
    ).rejects.toBeInstanceOf(UpstreamQueryError)

    expect(target.createSession).not.toHaveBeenCalled()
  })

  it('hands the abort signal to the ShotGrid query', async () => {
    const { service, source } = setup([populatedRecord])
    const controller = new AbortController()

    await service.synchronize({
      entityType: 'Element',
      ids: [10],
      diagnostic: false,
      signal: controller.signal,
    })

    expect(source.find.mock.calls[0][3]).toBe(controller.signal)
  })

  it('stops before opening a session once the request is aborted', async () => {
    const { service, target } = setup([populatedRecord])
    const controller = new AbortController()
    controller.abort()

    await expect(
      service.synchronize({
        entityType: 'Element',
        ids: [10],
        diagnostic: false,
        signal: controller.signal,
      }),
    ).rejects.toMatchObject({ name: 'AbortError' })

    expect(target.createSession).not.toHaveBeenCalled()
  })

  it('releases the session when the client disconnects during submission', async () => {
    const controller = new AbortController()
    const { service, target } = setup([populatedRecord])
    target.createRecords.mockImplementationOnce(async () => {
      controller.abort()
      throw new SubmissionError('Failed to send to FileMaker: FileMaker request aborted', 1)
    })

    await expect(
      service.synchronize({
        entityType: 'Element',
        ids: [10],
        diagnostic: false,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(SubmissionError)

    expect(target.closeSession).toHaveBeenCalledTimes(1)
  })
})
