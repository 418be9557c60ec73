import type { ReactNode } from 'react'

export default function Card({
  title,
  children,
  right,
}: {
  title: ReactNode
  children: ReactNode
  right?: ReactNode
}) {
  return (
    <section className="bg-white rounded-2xl shadow-sm border overflow-hidden">
      <div className="px-4 py-3 border-b flex items-center justify-between">
        <h2 className="font-semibold text-blue-700">{title}</h2>
        {right}
      </div>
      <div className="p-4">{children}</div>
    </section>
  )
}
