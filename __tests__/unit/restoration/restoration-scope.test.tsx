import { useLayoutEffect, type ReactNode } from 'react'
import { act } from 'react-test-renderer'

import { useStateRestoration } from '@/lib/hooks/use-state-restoration'
import type { RestorationBucket } from '@/lib/restoration/restoration-bucket'
import {
  RestorationManagerProvider,
  RestorationScope,
  RootRestorationScope,
  UnmanagedRestorationScope,
  useRestorationScope,
} from '@/lib/restoration/restoration-scope'

import {
  Counter,
  appTree,
  createTestManager,
  mount,
  probedCount,
  type CounterProbe,
} from '../hooks/test-utils/render-restoration-app'

const STORED_COUNT_5 = '{"version":1,"data":{"c":{"app":{"c":{"counter":{"v":{"count":5}}}}}}}'

describe('restoration scopes', () => {
  it('shows the fallback until stored data is loaded, then the restored values', async () => {
    const { manager } = createTestManager(STORED_COUNT_5)
    const probe: CounterProbe = {}

    const renderer = mount(appTree(manager, <Counter probe={probe} />, 'loading'))

    expect(renderer.toJSON()).toBe('loading')

    await act(async () => {
      await manager.rootBucket
    })

    expect(renderer.toJSON()).toBe('5')
  })

  it('renders restored values in the first render once the root is loaded', async () => {
    const { manager } = createTestManager(STORED_COUNT_5)
    await manager.rootBucket
    const probe: CounterProbe = {}

    const renderer = mount(appTree(manager, <Counter probe={probe} />, 'loading'))

    expect(renderer.toJSON()).toBe('5')
  })

  it('writes changes through the scope chain to the store', async () => {
    const { manager, store } = createTestManager(STORED_COUNT_5)
    await manager.rootBucket
    const probe: CounterProbe = {}
    const renderer = mount(appTree(manager, <Counter probe={probe} />))

    act(() => {
      probedCount(probe).value = 6
    })
    await manager.flushData()

    expect(renderer.toJSON()).toBe('6')
    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{"c":{"counter":{"v":{"count":6}}}}}}}')
  })

  it('stores defaults for a fresh tree', async () => {
    const { manager, store } = createTestManager()
    await manager.rootBucket

    mount(appTree(manager, <Counter probe={{}} />))
    await manager.flushData()

    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{"c":{"counter":{"v":{"count":0}}}}}}}')
  })

  it('keeps nothing for a component without a restoration id', async () => {
    const { manager, store } = createTestManager()
    await manager.rootBucket
    const probe: CounterProbe = {}

    const renderer = mount(appTree(manager, <Counter probe={probe} restorationId={null} />))
    act(() => {
      probedCount(probe).value = 2
    })
    await manager.flushData()

    expect(renderer.toJSON()).toBe('2')
    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{}}}}')
  })

  it('nests scopes under their restoration ids', async () => {
    const { manager, store } = createTestManager()
    await manager.rootBucket

    mount(
      appTree(
        manager,
        <RestorationScope restorationId="settings">
          <Counter probe={{}} />
        </RestorationScope>
      )
    )
    await manager.flushData()

    expect(store.snapshot).toBe(
      '{"version":1,"data":{"c":{"app":{"c":{"settings":{"c":{"counter":{"v":{"count":0}}}}}}}}}'
    )
  })

  it('restores the subtree again when new restoration data arrives', async () => {
    const { manager, store } = createTestManager(STORED_COUNT_5)
    await manager.rootBucket
    const probe: CounterProbe = {}
    const renderer = mount(appTree(manager, <Counter probe={probe} />))

    act(() => {
      manager.handleRestorationUpdate({
        enabled: true,
        data: { children: new Map([['app', { children: new Map([['counter', { values: new Map([['count', 42]]) }]]) }]]) },
      })
    })

    expect(renderer.toJSON()).toBe('42')
    expect(manager.isReplacing).toBe(false)

    act(() => {
      probedCount(probe).value = 43
    })
    await manager.flushData()

    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{"c":{"counter":{"v":{"count":43}}}}}}}')
  })

  it('follows a root replaced before the scope has subscribed to the manager', async () => {
    const { manager, store } = createTestManager(STORED_COUNT_5)
    await manager.rootBucket
    const probe: CounterProbe = {}
    const Replacer = () => {
      useLayoutEffect(() => {
        manager.handleRestorationUpdate({
          enabled: true,
          data: { children: new Map([['app', { children: new Map([['counter', { values: new Map([['count', 42]]) }]]) }]]) },
        })
      }, [])
      return null
    }

    const renderer = mount(
      appTree(
        manager,
        <>
          <Counter probe={probe} />
          <Replacer />
        </>
      )
    )

    expect(renderer.toJSON()).toBe('42')
    expect(manager.isReplacing).toBe(false)

    act(() => {
      probedCount(probe).value = 43
    })
    await manager.flushData()

    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{"c":{"counter":{"v":{"count":43}}}}}}}')
  })

  it('falls back to defaults when restoration is switched off', async () => {
    const { manager } = createTestManager(STORED_COUNT_5)
    await manager.rootBucket
    const probe: CounterProbe = {}
    const renderer = mount(appTree(manager, <Counter probe={probe} />))

    act(() => {
      manager.handleRestorationUpdate({ enabled: false, data: null })
    })
    act(() => {
      probedCount(probe).value = 8
    })

    expect(renderer.toJSON()).toBe('8')
  })

  it('renders children without restoration when loading fails', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
    const { manager, store } = createTestManager()
    const failure = new Error('storage unavailable')
    jest.spyOn(store, 'load').mockRejectedValueOnce(failure)
    const probe: CounterProbe = {}

    const renderer = mount(appTree(manager, <Counter probe={probe} />, 'loading'))
    await act(async () => {
      await manager.rootBucket.catch(() => null)
    })

    expect(renderer.toJSON()).toBe('0')
    expect(errorSpy).toHaveBeenCalledWith('[RootRestorationScope] Failed to load restoration data:', failure)
    errorSpy.mockRestore()
  })

  it('exposes the nearest bucket to descendants', async () => {
    const { manager } = createTestManager()
    const root = await manager.rootBucket
    const seen: Array<RestorationBucket | null> = []
    const Reader = () => {
      seen.push(useRestorationScope())
      return null
    }

    mount(
      <RestorationManagerProvider manager={manager}>
        <Reader />
        <UnmanagedRestorationScope bucket={root}>
          <Reader />
        </UnmanagedRestorationScope>
      </RestorationManagerProvider>
    )

    expect(seen).toHaveLength(2)
    expect(seen[0]).toBeNull()
    expect(seen[1]).toBe(root)
  })

  it('uses an enclosing scope instead of the manager root when nested', async () => {
    const { manager, store } = createTestManager()
    await manager.rootBucket
    const Outer = ({ children }: { children: ReactNode }) => {
      const restoration = useStateRestoration({ restorationId: 'outer', restoreState: () => {} })
      return <UnmanagedRestorationScope bucket={restoration.bucket}>{children}</UnmanagedRestorationScope>
    }

    mount(
      appTree(
        manager,
        <Outer>
          <RootRestorationScope restorationId="inner">
            <Counter probe={{}} />
          </RootRestorationScope>
        </Outer>
      )
    )
    await manager.flushData()

    expect(store.snapshot).toBe(
      '{"version":1,"data":{"c":{"app":{"c":{"outer":{"c":{"inner":{"c":{"counter":{"v":{"count":0}}}}}}}}}}}'
    )
  })
})
