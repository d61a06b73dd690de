interface NoDataProps {
  message?: string;
}

export default function NoData({ message = 'No data matches the current filter criteria.' }: NoDataProps) {
  return (
    <div className="no-data" role="status">
      {message}
    </div>
  );
}
