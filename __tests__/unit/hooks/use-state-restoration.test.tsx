import { StrictMode } from 'react'
import { act } from 'react-test-renderer'

import { useStateRestoration, type StateRestoration } from '@/lib/hooks/use-state-restoration'
import { RestorationScope } from '@/lib/restoration/restoration-scope'

import {
  Counter,
  appTree,
  createTestManager,
  mount,
  probedCount,
  type CounterProbe,
} from './test-utils/render-restoration-app'

const STORED_COUNT_5 = '{"version":1,"data":{"c":{"app":{"c":{"counter":{"v":{"count":5}}}}}}}'

describe('useStateRestoration', () => {
  it('restores and saves under StrictMode double rendering', async () => {
    const { manager, store } = createTestManager(STORED_COUNT_5)
    await manager.rootBucket
    const probe: CounterProbe = {}

    const renderer = mount(<StrictMode>{appTree(manager, <Counter probe={probe} />)}</StrictMode>)

    expect(renderer.toJSON()).toBe('5')

    act(() => {
      probedCount(probe).value = 6
    })
    await manager.flushData()

    expect(renderer.toJSON()).toBe('6')
    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{"c":{"counter":{"v":{"count":6}}}}}}}')
  })

  it('drops the component data once it unmounts', async () => {
    const { manager, store } = createTestManager(STORED_COUNT_5)
    await manager.rootBucket
    const probe: CounterProbe = {}
    const renderer = mount(appTree(manager, <Counter probe={probe} />))

    await act(async () => {
      renderer.update(appTree(manager, null))
    })
    await manager.flushData()

    expect(probedCount(probe).isDisposed).toBe(true)
    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{}}}}')
  })

  it('moves the data when the restoration id prop changes', async () => {
    const { manager, store } = createTestManager()
    await manager.rootBucket
    const probe: CounterProbe = {}
    const renderer = mount(appTree(manager, <Counter probe={probe} restorationId="first" />))

    act(() => {
      probedCount(probe).value = 3
    })
    act(() => {
      renderer.update(appTree(manager, <Counter probe={probe} restorationId="second" />))
    })
    await manager.flushData()

    expect(renderer.toJSON()).toBe('3')
    expect(store.snapshot).toBe('{"version":1,"data":{"c":{"app":{"c":{"second":{"v":{"count":3}}}}}}}')
  })

  it('keeps sibling components apart by restoration id', async () => {
    const { manager, store } = createTestManager()
    await manager.rootBucket
    const left: CounterProbe = {}
    const right: CounterProbe = {}
    mount(
      appTree(
        manager,
        <>
          <Counter probe={left} restorationId="left" />
          <Counter probe={right} restorationId="right" />
        </>
      )
    )

    act(() => {
      probedCount(right).value = 1
    })
    await manager.flushData()

    expect(store.snapshot).toBe(
      '{"version":1,"data":{"c":{"app":{"c":{"left":{"v":{"count":0}},"right":{"v":{"count":1}}}}}}}'
    )
  })

  it('reports a pending restore only until restoreState has run', async () => {
    const { manager } = createTestManager()
    await manager.rootBucket
    const seen: boolean[] = []
    const captured: { restoration?: StateRestoration } = {}
    const Probe = () => {
      const restoration = useStateRestoration({
        restorationId: 'probe',
        restoreState: (_oldBucket, _initialRestore, current) => {
          seen.push(current.restorePending)
        },
      })
      captured.restoration = restoration
      return null
    }

    mount(
      appTree(
        manager,
        <RestorationScope restorationId="section">
          <Probe />
        </RestorationScope>
      )
    )

    expect(seen).toEqual([true])
    expect(captured.restoration?.restorePending).toBe(false)
    expect(captured.restoration?.bucket?.restorationId).toBe('probe')
  })
})
