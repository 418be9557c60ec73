import { act, type ReactElement } from 'react'
import { createRoot, type Root } from 'react-dom/client'

Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true)

export type Mounted = { container: HTMLDivElement; root: Root; unmount: () => Promise<void> }

/** Render into a detached container and flush effects. */
export async function mount(ui: ReactElement): Promise<Mounted> {
  const container = document.createElement('div')
  document.body.appendChild(container)
  const root = createRoot(container)
  await act(async () => {
    root.render(ui)
  })
  return {
    container,
    root,
    unmount: async () => {
      await act(async () => root.unmount())
      container.remove()
    },
  }
}
