import { ReviewWorkspace } from "@/components/review/ReviewWorkspace";

export default function Home() {
  return <ReviewWorkspace />;
}
