export default function ErrorState({
  message = 'Something went wrong.',
  onRetry,
}: {
  message?: string
  onRetry?: () => void
}) {
  return (
    <div role="alert" className="text-red-600 text-sm space-y-2">
      <p>{message}</p>
      {onRetry && (
        <button
          type="button"
          onClick={onRetry}
          className="rounded-lg border px-3 py-1 text-slate-700 hover:bg-slate-100"
        >
          Try again
        </button>
      )}
    </div>
  )
}
