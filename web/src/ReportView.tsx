import Markdown from "react-markdown";

export default function ReportView({ markdown }: { markdown: string }) {
  return (
    <div className="prose prose-sm max-w-none prose-gray">
      <Markdown>{markdown}</Markdown>
    </div>
  );
}
