import { RestorationError } from '@/lib/restoration/errors'
import { RestorationBucket, type RestorationBucketManager } from '@/lib/restoration/restoration-bucket'
import type { RawBucketData } from '@/lib/restoration/restoration-codec'

const createManager = () => ({
  isReplacing: false,
  scheduleSerializationFor: jest.fn<void, [RestorationBucket]>(),
  unscheduleSerializationFor: jest.fn<void, [RestorationBucket]>(),
}) satisfies RestorationBucketManager

const storedTree = (): RawBucketData => ({
  values: new Map([['theme', 'dark']]),
  children: new Map([
    ['sidebar', { values: new Map([['width', 280]]) }],
    ['editor', { values: new Map([['draft', 'hello']]) }],
  ]),
})

describe('RestorationBucket', () => {
  describe('values', () => {
    it('reads stored values and reports what it contains', () => {
      const root = RestorationBucket.root(createManager(), storedTree())

      expect(root.contains('theme')).toBe(true)
      expect(root.read('theme')).toBe('dark')
      expect(root.contains('missing')).toBe(false)
      expect(root.read('missing')).toBeUndefined()
    })

    it('schedules one serialization per frame however many values change', () => {
      const manager = createManager()
      const root = RestorationBucket.root(manager, null)

      root.write('a', 1)
      root.write('b', [1, 2])
      root.remove('a')

      expect(manager.scheduleSerializationFor).toHaveBeenCalledTimes(1)
      expect(manager.scheduleSerializationFor).toHaveBeenCalledWith(root)
      expect(root.data.values).toEqual(new Map([['b', [1, 2]]]))
    })

    it('does not mark itself dirty when the written value is unchanged', () => {
      const manager = createManager()
      const root = RestorationBucket.root(manager, { values: new Map([['filters', { tags: ['x'] }]]) })

      root.write('filters', { tags: ['x'] })

      expect(manager.scheduleSerializationFor).not.toHaveBeenCalled()
    })

    it('schedules again after the manager finalized it', () => {
      const manager = createManager()
      const root = RestorationBucket.root(manager, null)

      root.write('a', 1)
      root.finalize()
      root.write('a', 2)

      expect(manager.scheduleSerializationFor).toHaveBeenCalledTimes(2)
    })

    it('drops the values map once the last value is removed', () => {
      const root = RestorationBucket.root(createManager(), { values: new Map([['only', true]]) })

      expect(root.remove('only')).toBe(true)
      expect(root.remove('only')).toBeUndefined()
      expect(root.data.values).toBeUndefined()
    })

    it('rejects values that cannot be serialized', () => {
      const root = RestorationBucket.root(createManager(), null)

      expect(() => root.write('ratio', Number.NaN)).toThrow(
        'The value written under "ratio" cannot be serialized for restoration.'
      )
    })
  })

  describe('children', () => {
    it('hands out stored data when a child is claimed', () => {
      const root = RestorationBucket.root(createManager(), storedTree())

      const sidebar = root.claimChild('sidebar', 'Sidebar')

      expect(sidebar.restorationId).toBe('sidebar')
      expect(sidebar.read('width')).toBe(280)
      expect(sidebar.data).toBe(root.data.children?.get('sidebar'))
    })

    it('links a new child into the tree and marks the parent dirty', () => {
      const manager = createManager()
      const root = RestorationBucket.root(manager, null)

      const child = root.claimChild('fresh')
      child.write('count', 1)

      expect(root.data.children?.get('fresh')).toBe(child.data)
      expect(manager.scheduleSerializationFor).toHaveBeenCalledWith(root)
      expect(manager.scheduleSerializationFor).toHaveBeenCalledWith(child)
    })

    it('reports two owners claiming the same id when the frame is finalized', () => {
      const root = RestorationBucket.root(createManager(), storedTree())
      const first = root.claimChild('editor', 'EditorA')
      const second = root.claimChild('editor', 'EditorB')

      expect(second.read('draft')).toBeUndefined()
      expect(() => root.finalize()).toThrow('"editor" (claimed by EditorA, EditorB)')

      first.dispose()

      expect(() => root.finalize()).not.toThrow()
      expect(root.data.children?.get('editor')).toBe(second.data)
    })

    it('moves data with a renamed child', () => {
      const root = RestorationBucket.root(createManager(), storedTree())
      const editor = root.claimChild('editor')

      editor.rename('notes')

      expect(editor.restorationId).toBe('notes')
      expect(root.data.children?.has('editor')).toBe(false)
      expect(root.data.children?.get('notes')).toBe(editor.data)
      expect(editor.read('draft')).toBe('hello')
    })

    it('moves a child and its data between parents on adoption', () => {
      const root = RestorationBucket.root(createManager(), null)
      const left = root.claimChild('left')
      const right = root.claimChild('right')
      const item = left.claimChild('item')
      item.write('label', 'first')

      right.adoptChild(item)

      expect(left.data.children).toBeUndefined()
      expect(right.data.children?.get('item')).toBe(item.data)
      expect(item.read('label')).toBe('first')
    })

    it('carries pending serialization of a detached bucket into its new manager', () => {
      const manager = createManager()
      const root = RestorationBucket.root(manager, null)
      const detached = RestorationBucket.empty('detached')
      detached.write('value', 1)

      root.adoptChild(detached)

      expect(manager.scheduleSerializationFor).toHaveBeenCalledWith(detached)
      expect(detached.isReplacing).toBe(false)
    })

    it('lets a later claim take over a provisional one', () => {
      const root = RestorationBucket.root(createManager(), storedTree())
      const discarded = root.claimChild('editor', 'first render', { provisional: true })
      const kept = root.claimChild('editor', 'second render', { provisional: true })

      expect(discarded.isAttached).toBe(false)
      expect(kept.read('draft')).toBe('hello')
      expect(kept.isProvisional).toBe(true)

      kept.commitClaim()

      expect(kept.isProvisional).toBe(false)
      expect(() => root.finalize()).not.toThrow()
    })

    it('still reports a clash when an evicted provisional owner commits', () => {
      const root = RestorationBucket.root(createManager(), storedTree())
      const evicted = root.claimChild('editor', 'EditorA', { provisional: true })
      root.claimChild('editor', 'EditorB')

      evicted.commitClaim()
      root.adoptChild(evicted)

      expect(() => root.finalize()).toThrow('"editor" (claimed by EditorB, EditorA)')
    })
  })

  describe('dispose', () => {
    it('removes its data from the parent and refuses further use', () => {
      const root = RestorationBucket.root(createManager(), storedTree())
      const sidebar = root.claimChild('sidebar')

      sidebar.dispose()

      expect(root.data.children?.has('sidebar')).toBe(false)
      expect(sidebar.isDisposed).toBe(true)
      expect(() => sidebar.read('width')).toThrow(RestorationError)
    })

    it('detaches claimed children without disposing them', () => {
      const manager = createManager()
      const root = RestorationBucket.root(manager, storedTree())
      const editor = root.claimChild('editor')

      root.dispose()

      expect(editor.isDisposed).toBe(false)
      expect(editor.isAttached).toBe(false)
      editor.write('draft', 'changed')
      expect(manager.scheduleSerializationFor).not.toHaveBeenCalledWith(editor)
    })
  })

  it('describes itself with its id and owner', () => {
    const bucket = RestorationBucket.empty('panel', 'PanelView')

    expect(String(bucket)).toBe('RestorationBucket(restorationId: panel, owner: PanelView)')
  })
})
